export { checkFrontmatter, locateFrontmatter, decodeUtf8, describeRejection } from './frontmatter.ts';
export type { FrontmatterBlock } from './frontmatter.ts';
export { truncateContent, utf8ByteLength } from './truncate.ts';
