/**
 * 테스트용 프로젝트 복사본 준비
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { CommandRunner } from './command-runner';
import logger from '../../utils/logger';

/** devenv가 요구하는 pre-commit 훅 자리에 두는 빈 훅 */
export const NOOP_HOOK = '#!/bin/sh\nexit 0\n';

/**
 * 파일명 패턴 (`*`, `?` 와일드카드)을 정규식으로
 */
function patternToRegExp(pattern: string): RegExp {
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${source}$`);
}

/**
 * 경로의 마지막 이름이 패턴 중 하나와 맞으면 제외
 */
export function createIgnoreFilter(patterns: readonly string[]): (src: string) => boolean {
  const matchers = patterns.map(patternToRegExp);
  return (src: string) => {
    const name = path.basename(src);
    return !matchers.some((matcher) => matcher.test(name));
  };
}

/**
 * 저장소를 임시 위치로 복사 (가상환경, 캐시, .git 등 제외)
 * @returns 복사된 디렉토리
 */
export async function copyProject(
  repoRoot: string,
  dest: string,
  ignorePatterns: readonly string[]
): Promise<string> {
  const source = path.resolve(repoRoot);
  const include = createIgnoreFilter(ignorePatterns);

  await fs.copy(source, dest, {
    // 루트 자신은 이름과 상관없이 복사
    filter: (src) => src === source || include(src),
  });

  logger.debug('프로젝트 복사 완료', { source, dest });
  return dest;
}

/**
 * git 저장소를 초기화하고 아무 것도 하지 않는 pre-commit 훅을 설치
 * @returns 훅 파일 경로
 */
export async function installNoopPreCommitHook(projectDir: string, runner: CommandRunner): Promise<string> {
  runner.run('git', ['init', '-q'], { cwd: projectDir });

  const hooksDir = path.join(projectDir, '.git', 'hooks');
  await fs.ensureDir(hooksDir);

  const hookPath = path.join(hooksDir, 'pre-commit');
  await fs.writeFile(hookPath, NOOP_HOOK, 'utf-8');
  await fs.chmod(hookPath, 0o755);

  return hookPath;
}
