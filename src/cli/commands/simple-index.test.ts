import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { addCommand, listCommand, rootCommand, seedCommand, urlCommand } from './simple-index';
import { parseSimplePage } from '../../core/simple-index/simple-page-parser';
import { useTempDir } from '../../test-utils/temp-dir';

describe('simple-index 명령어', () => {
  const tmp = useTempDir();
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const indexDir = (): string => path.join(tmp.path, 'index');

  it('url은 simple 디렉토리의 file URL을 출력', async () => {
    await urlCommand({ index: indexDir() });
    expect(console.log).toHaveBeenCalledWith(pathToFileURL(path.join(indexDir(), 'simple')).href + '/');
  });

  it('add는 이전 실행에서 추가한 링크를 유지', async () => {
    await addCommand('Demo_Pkg', '1.0.0', { index: indexDir(), uploadTime: '2024-01-01T00:00:00Z' });
    await addCommand('demo-pkg', '2.0.0', { index: indexDir(), uploadTime: '2024-02-01T00:00:00Z' });

    const page = await fs.readFile(path.join(indexDir(), 'simple', 'demo-pkg', 'index.html'), 'utf-8');
    expect(parseSimplePage(page).map((link) => [link.text, link.uploadTime])).toEqual([
      ['Demo_Pkg-1.0.0-py3-none-any.whl', '2024-01-01T00:00:00Z'],
      ['demo_pkg-2.0.0-py3-none-any.whl', '2024-02-01T00:00:00Z'],
    ]);
  });

  it('seed는 lock 파일의 아티팩트를 등록', async () => {
    const lockPath = path.join(tmp.path, 'uv.lock');
    await fs.writeFile(
      lockPath,
      [
        '[[package]]',
        'name = "idna"',
        'version = "3.7"',
        `sdist = { url = "https://files.example/idna-3.7.tar.gz", hash = "sha256:${'a'.repeat(64)}" }`,
        '',
      ].join('\n')
    );

    await seedCommand({ index: indexDir(), lock: lockPath });

    expect(await fs.pathExists(path.join(indexDir(), 'simple', 'idna', 'index.html'))).toBe(true);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('1개 패키지 등록'));
  });

  it('list는 빈 인덱스를 알림', async () => {
    await listCommand({ index: indexDir() });
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('등록된 패키지가 없습니다'));
  });

  it('root는 패키지 목록 페이지를 작성', async () => {
    await addCommand('demo', '1.0.0', { index: indexDir(), uploadTime: '2024-01-01T00:00:00Z' });
    await rootCommand({ index: indexDir() });

    const root = await fs.readFile(path.join(indexDir(), 'simple', 'index.html'), 'utf-8');
    expect(root).toContain('<a href="demo/">demo</a>');
  });
});
