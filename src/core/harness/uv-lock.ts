/**
 * uv.lock 읽기와 고정 버전 확인
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { parse as parseToml } from '@iarna/toml';
import { z } from 'zod';
import { LockEntryShapeError, LockedVersionMismatchError } from '../errors';
import { LocalSimpleIndex } from '../simple-index/local-simple-index';
import logger from '../../utils/logger';

const LockedVersionSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

/**
 * uv.lock의 [[package]] 엔트리 목록 (검증 전)
 */
export async function readUvLock(lockPath: string): Promise<unknown[]> {
  const data = parseToml(await fs.readFile(lockPath, 'utf-8'));
  const packages = data.package;
  return Array.isArray(packages) ? packages : [];
}

/**
 * 패키지 이름 -> 고정 버전
 */
export async function loadLockedVersions(lockPath: string): Promise<Map<string, string>> {
  const versions = new Map<string, string>();

  for (const raw of await readUvLock(lockPath)) {
    const result = LockedVersionSchema.safeParse(raw);
    if (!result.success) {
      throw new LockEntryShapeError(result.error);
    }
    versions.set(result.data.name, result.data.version);
  }

  return versions;
}

/**
 * requirements 파일에 `name==version` 줄이 있는지 확인
 */
export function hasPinnedRequirement(content: string, packageName: string, version: string): boolean {
  const pin = `${packageName}==${version}`.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^${pin}(?=\\s|;|\\\\|$)`, 'm').test(content);
}

export interface LockedVersionFiles {
  lockFileName: string;
  mirrorRequirementsFile: string;
}

/**
 * lock 파일과 미러 requirements 파일 둘 다 기대 버전을 고정하는지 확인
 */
export async function assertLockedVersion(
  projectDir: string,
  packageName: string,
  version: string,
  files: LockedVersionFiles
): Promise<void> {
  const versions = await loadLockedVersions(path.join(projectDir, files.lockFileName));
  const locked = versions.get(packageName);
  if (locked !== version) {
    throw new LockedVersionMismatchError(packageName, version, locked, files.lockFileName);
  }

  const mirror = await fs.readFile(path.join(projectDir, files.mirrorRequirementsFile), 'utf-8');
  if (!hasPinnedRequirement(mirror, packageName, version)) {
    throw new LockedVersionMismatchError(packageName, version, undefined, files.mirrorRequirementsFile);
  }

  logger.debug('고정 버전 확인', { packageName, version });
}

/**
 * lock 파일의 모든 엔트리를 인덱스에 등록
 * @returns 링크가 생긴 패키지 수
 */
export async function seedIndexFromLock(index: LocalSimpleIndex, lockPath: string): Promise<number> {
  let seeded = 0;
  for (const entry of await readUvLock(lockPath)) {
    if ((await index.addLockedPackage(entry)) > 0) {
      seeded++;
    }
  }

  logger.info('lock 파일로 인덱스 구성', { lockPath, packages: seeded });
  return seeded;
}
