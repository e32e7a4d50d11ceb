import pc from 'picocolors';
import ora, { type Ora } from 'ora';

export interface Logger {
  log(message?: string): void;
  line(): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  section(title: string): void;
  label(key: string, value: string): void;
  spinner(text?: string): Ora;
}

export const logger: Logger = {
  log(message = ''): void {
    console.log(message);
  },
  line(): void {
    console.log();
  },
  success(message: string): void {
    console.log(`${pc.green('✓')} ${message}`);
  },
  warning(message: string): void {
    console.log(`${pc.yellow('⚠')} ${message}`);
  },
  error(message: string): void {
    console.error(`${pc.red('✖')} ${message}`);
  },
  debug(message: string): void {
    if (process.env['DEBUG']) {
      console.log(`${pc.dim('⋯')} ${pc.dim(message)}`);
    }
  },
  section(title: string): void {
    console.log();
    console.log(pc.bold(pc.cyan(title)));
  },
  label(key: string, value: string): void {
    console.log(`${pc.dim(`${key}:`)}${' '.repeat(Math.max(1, 22 - key.length))}${value}`);
  },
  spinner(text?: string): Ora {
    const s = ora({ stream: process.stdout });
    if (text) s.start(text);
    return s;
  },
};
