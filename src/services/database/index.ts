export { SourceDatabase } from './source-db.ts';
export type { RepoMetadataRow, FileHistoryRow } from './source-db.ts';
export { OutputDatabase } from './output-db.ts';
