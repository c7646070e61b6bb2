/**
 * uv 실행 환경 구성
 */

import * as fs from 'fs-extra';

export interface UvEnvironmentOptions {
  /** 복사 원본 (기본값 process.env) */
  baseEnv?: NodeJS.ProcessEnv;
  /** 다른 테스트와 섞이지 않게 분리한 uv 캐시 */
  cacheDir: string;
  /** 주어지면 uv가 이 인덱스만 보도록 한다 */
  indexUrl?: string;
}

/**
 * uv 명령에 넘길 환경변수
 * 활성화된 가상환경은 제거하고 색상 출력은 끈다.
 */
export function buildUvEnvironment(options: UvEnvironmentOptions): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...(options.baseEnv ?? process.env) };

  delete env.VIRTUAL_ENV;
  env.UV_CACHE_DIR = options.cacheDir;
  env.UV_NO_COLOR = '1';

  if (options.indexUrl) {
    env.UV_INDEX_URL = options.indexUrl;
    env.UV_DEFAULT_INDEX = options.indexUrl;
    env.UV_EXTRA_INDEX_URL = '';
  }

  return env;
}

/**
 * 컨테이너 안에서 실행 중인지 확인
 */
export function isInsideContainer(markerPath = '/.dockerenv'): boolean {
  return fs.pathExistsSync(markerPath);
}
