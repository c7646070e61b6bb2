/**
 * uv.lock `[[package]]` 엔트리 형태
 * 인덱스 생성에 필요한 필드만 검사하고 나머지는 그대로 통과시킨다.
 */

import { z } from 'zod';
import { LockEntryShapeError } from '../errors';

// 예: sha256:9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08
const HASH_PATTERN = /^[A-Za-z0-9_-]+:[0-9A-Fa-f]+$/;

export const LockArtifactSchema = z
  .object({
    url: z.string().min(1),
    hash: z.string().regex(HASH_PATTERN, { message: '"<알고리즘>:<hex>" 형식이어야 합니다' }),
    // TOML 날짜 리터럴이면 Date로 들어온다
    'upload-time': z.union([z.string(), z.date()]).optional(),
  })
  .passthrough();
export type LockArtifact = z.infer<typeof LockArtifactSchema>;

export const LockEntrySchema = z
  .object({
    name: z.string().min(1),
    version: z.string().optional(),
    wheels: z.array(LockArtifactSchema).optional(),
    sdist: LockArtifactSchema.optional(),
  })
  .passthrough();
export type LockEntry = z.infer<typeof LockEntrySchema>;

/**
 * 알 수 없는 값을 lock 엔트리로 검증
 * 필수 필드가 없으면 LockEntryShapeError
 */
export function parseLockEntry(raw: unknown): LockEntry {
  const result = LockEntrySchema.safeParse(raw);
  if (!result.success) {
    const name =
      typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string'
        ? raw.name
        : undefined;
    throw new LockEntryShapeError(result.error, name);
  }
  return result.data;
}

/**
 * 인덱스에 올릴 아티팩트 목록
 * wheel이 있으면 wheel 전부, 없으면 sdist 하나, 둘 다 없으면 빈 배열
 * (빈 배열은 프로젝트 자신 같은 가상 패키지)
 */
export function lockedArtifacts(entry: LockEntry): LockArtifact[] {
  if (entry.wheels && entry.wheels.length > 0) {
    return entry.wheels;
  }
  if (entry.sdist) {
    return [entry.sdist];
  }
  return [];
}

/**
 * "sha256:abcd" -> "abcd"
 */
export function hashDigest(hash: string): string {
  const separator = hash.indexOf(':');
  return separator === -1 ? hash : hash.slice(separator + 1);
}

/**
 * URL의 마지막 경로 조각 (쿼리, 프래그먼트 제외)
 */
export function artifactFilename(url: string): string {
  const withoutQuery = url.split(/[?#]/, 1)[0];
  const segments = withoutQuery.split('/');
  return segments[segments.length - 1];
}
