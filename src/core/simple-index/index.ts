// 로컬 simple 인덱스
export { LocalSimpleIndex, PACKAGE_PAGE } from './local-simple-index';

// wheel 생성
export { buildWheel, wheelFiles, recordDigest, sha256Hex, WHEEL_GENERATOR } from './wheel-builder';

// lock 엔트리
export {
  LockArtifactSchema,
  LockEntrySchema,
  parseLockEntry,
  lockedArtifacts,
  hashDigest,
  artifactFilename,
} from './lock-entry';
export type { LockArtifact, LockEntry } from './lock-entry';

// 페이지 생성/파싱
export { escapeHtml, formatUploadTime, renderAnchor, renderPackagePage, renderRootPage } from './simple-page-html';
export { parseSimplePage, unescapeHtml } from './simple-page-parser';
