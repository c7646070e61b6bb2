/// <reference types="vitest/globals" />

/**
 * 테스트용 임시 디렉토리 유틸리티
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

/**
 * 테스트마다 새 임시 디렉토리를 만들고 afterEach에서 지운다.
 * @example
 * const tmp = useTempDir();
 * it('...', () => { const dir = tmp.path; });
 */
export function useTempDir(prefix = 'simple-index-'): { readonly path: string } {
  let current = '';

  beforeEach(async () => {
    current = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  });

  afterEach(async () => {
    if (current) {
      await fs.remove(current);
      current = '';
    }
  });

  return {
    get path(): string {
      return current;
    },
  };
}
