export {
  validateCandidates,
  selectPending,
  emptyCounts,
  type RecordSink,
  type ValidateOptions,
} from './orchestrator.ts';
export {
  loadCandidateContent,
  runStructuralCheck,
  runSemanticCheck,
  makeRecord,
  SKIP_REASONS,
  type CandidateStage,
  type LocatedCandidate,
  type LoadResult,
  type StructuralResult,
  type SemanticTask,
  type SemanticCheckOptions,
} from './stages.ts';
export { prefetchVerdicts, type PrefetchOptions } from './prefetch.ts';
