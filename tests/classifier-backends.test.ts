import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  AnthropicBackend,
  OpenAICompatibleBackend,
  createBackend,
  resolveBackendKind,
} from '../src/services/classifier/backends/index.ts';
import { parseVerdictResponse } from '../src/services/classifier/response.ts';
import { renderPrompt } from '../src/services/classifier/prompt.ts';
import { ClassificationParseError, ConfigError, TransportError } from '../src/core/errors.ts';
import type { ClassificationInput } from '../src/core/types.ts';

const mocks = vi.hoisted(() => {
  const anthropicOptions: unknown[] = [];
  const openaiOptions: unknown[] = [];
  return {
    anthropicCreate: vi.fn(),
    openaiCreate: vi.fn(),
    anthropicOptions,
    openaiOptions,
  };
});

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mocks.anthropicCreate };
    constructor(options: unknown) {
      mocks.anthropicOptions.push(options);
    }
  },
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: mocks.openaiCreate } };
    constructor(options: unknown) {
      mocks.openaiOptions.push(options);
    }
  },
}));

const INPUT: ClassificationInput = {
  promptTemplate: 'Classify this file:\n{{content}}\nAnswer in JSON.',
  model: 'test-model',
  content: '---\nname: foo\ndescription: does X\n---\n',
};

const RENDERED = 'Classify this file:\n---\nname: foo\ndescription: does X\n---\n\nAnswer in JSON.';

beforeEach(() => {
  mocks.anthropicCreate.mockReset();
  mocks.openaiCreate.mockReset();
  mocks.anthropicOptions.length = 0;
  mocks.openaiOptions.length = 0;
});

describe('renderPrompt', () => {
  it('substitutes the content', () => {
    expect(renderPrompt(INPUT.promptTemplate, INPUT.content)).toBe(RENDERED);
  });

  it('keeps dollar sequences in the content literal', () => {
    expect(renderPrompt('<{{content}}>', "cost: $& and $'")).toBe("<cost: $& and $'>");
  });
});

describe('parseVerdictResponse', () => {
  it('reads a bare JSON verdict', () => {
    expect(parseVerdictResponse('{"is_skill": true, "reason": "Defines a skill"}')).toEqual({
      decision: 'valid-skill',
      reason: 'Defines a skill',
    });
  });

  it('reads a fenced JSON block', () => {
    const text = 'Here is my answer:\n```json\n{"is_skill": false, "reason": "Just a README"}\n```';
    expect(parseVerdictResponse(text)).toEqual({ decision: 'rejected', reason: 'Just a README' });
  });

  it('reads a verdict embedded in prose', () => {
    expect(parseVerdictResponse('Verdict: {"is_skill": true} as requested')).toEqual({
      decision: 'valid-skill',
      reason: '',
    });
  });

  it('trims the reason', () => {
    expect(parseVerdictResponse('{"is_skill": false, "reason": "  template only  "}').reason).toBe(
      'template only'
    );
  });

  it('rejects an empty response', () => {
    expect(() => parseVerdictResponse('   ')).toThrow('Model returned an empty response');
  });

  it('rejects a response without a boolean is_skill', () => {
    expect(() => parseVerdictResponse('{"reason": "no verdict"}')).toThrow(ClassificationParseError);
    expect(() => parseVerdictResponse('{"is_skill": "true"}')).toThrow(ClassificationParseError);
    expect(() => parseVerdictResponse('Yes, this is a skill.')).toThrow(
      'Could not read a verdict from the model response: Yes, this is a skill.'
    );
  });
});

describe('AnthropicBackend', () => {
  it('sends the rendered prompt deterministically and parses the reply', async () => {
    mocks.anthropicCreate.mockResolvedValue({
      content: [{ type: 'text', text: '{"is_skill": true, "reason": "Real skill"}' }],
    });
    const backend = new AnthropicBackend({ apiKey: 'test-secret', maxOutputTokens: 256 });

    await expect(backend.classify(INPUT)).resolves.toEqual({ decision: 'valid-skill', reason: 'Real skill' });
    expect(mocks.anthropicCreate).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 256,
      temperature: 0,
      messages: [{ role: 'user', content: RENDERED }],
    });
    expect(mocks.anthropicOptions[0]).toMatchObject({ apiKey: 'test-secret', maxRetries: 0 });
  });

  it('joins text blocks', async () => {
    mocks.anthropicCreate.mockResolvedValue({
      content: [
        { type: 'text', text: '{"is_skill": false, ' },
        { type: 'text', text: '"reason": "Docs"}' },
      ],
    });
    const backend = new AnthropicBackend({ apiKey: 'test-secret', maxOutputTokens: 64 });
    await expect(backend.classify(INPUT)).resolves.toEqual({ decision: 'rejected', reason: 'Docs' });
  });

  it('wraps request failures in TransportError', async () => {
    mocks.anthropicCreate.mockRejectedValue(Object.assign(new Error('Overloaded'), { status: 529 }));
    const backend = new AnthropicBackend({ apiKey: 'test-secret', maxOutputTokens: 256 });

    const error = await backend.classify(INPUT).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.message).toBe('Anthropic request failed: Overloaded');
      expect(error.status).toBe(529);
      expect(error.backend).toBe('anthropic');
    }
  });
});

describe('OpenAICompatibleBackend', () => {
  it('talks to the configured endpoint with a placeholder key', async () => {
    mocks.openaiCreate.mockResolvedValue({
      choices: [{ message: { content: '```json\n{"is_skill": true, "reason": "ok"}\n```' } }],
    });
    const backend = new OpenAICompatibleBackend({ baseUrl: 'http://localhost:11434/v1', maxOutputTokens: 128 });

    await expect(backend.classify(INPUT)).resolves.toEqual({ decision: 'valid-skill', reason: 'ok' });
    expect(mocks.openaiOptions[0]).toMatchObject({
      apiKey: 'not-needed',
      baseURL: 'http://localhost:11434/v1',
      maxRetries: 0,
    });
    expect(mocks.openaiCreate).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 128,
      temperature: 0,
      messages: [{ role: 'user', content: RENDERED }],
    });
  });

  it('treats a reply without choices as unparseable', async () => {
    mocks.openaiCreate.mockResolvedValue({ choices: [] });
    const backend = new OpenAICompatibleBackend({ baseUrl: 'http://localhost:8080/v1', maxOutputTokens: 128 });
    await expect(backend.classify(INPUT)).rejects.toThrow('Model returned an empty response');
  });

  it('names the endpoint in transport errors', async () => {
    mocks.openaiCreate.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const backend = new OpenAICompatibleBackend({ baseUrl: 'http://localhost:8080/v1', maxOutputTokens: 128 });
    await expect(backend.classify(INPUT)).rejects.toThrow(
      'Request to http://localhost:8080/v1 failed: connect ECONNREFUSED'
    );
  });
});

describe('createBackend', () => {
  it('picks the OpenAI-compatible backend when a base URL is set', () => {
    expect(resolveBackendKind('auto', 'http://localhost:1234/v1')).toBe('openai-compatible');
    expect(resolveBackendKind('auto', undefined)).toBe('anthropic');
    expect(resolveBackendKind('anthropic', 'http://localhost:1234')).toBe('anthropic');
  });

  it('builds the backend for the resolved kind', () => {
    const local = createBackend({ backend: 'auto', baseUrl: 'http://localhost:1234/v1', maxOutputTokens: 256 });
    expect(local).toBeInstanceOf(OpenAICompatibleBackend);

    const hosted = createBackend({ backend: 'auto', maxOutputTokens: 256, anthropicApiKey: 'test-secret' });
    expect(hosted).toBeInstanceOf(AnthropicBackend);
    expect(hosted.name).toBe('anthropic');
  });

  it('requires an API key for the hosted backend', () => {
    expect(() => createBackend({ backend: 'anthropic', maxOutputTokens: 256 })).toThrow(ConfigError);
  });

  it('requires an API key or a base URL for the OpenAI-compatible backend', () => {
    expect(() => createBackend({ backend: 'openai-compatible', maxOutputTokens: 256 })).toThrow(
      'OPENAI_API_KEY is not set (or pass --base-url for a local model server)'
    );
    expect(mocks.openaiOptions).toHaveLength(0);

    const hosted = createBackend({ backend: 'openai-compatible', maxOutputTokens: 256, openaiApiKey: 'test-secret' });
    expect(hosted).toBeInstanceOf(OpenAICompatibleBackend);
  });
});
