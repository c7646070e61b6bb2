import { describe, it, expect } from 'vitest';
import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { LocalSimpleIndex } from './local-simple-index';
import { LockEntryShapeError } from '../errors';
import { useTempDir } from '../../test-utils/temp-dir';

const LOCK_SHA = 'a'.repeat(64);

const coverageEntry = {
  name: 'coverage',
  version: '7.0.0',
  source: { registry: 'https://pypi.org/simple' },
  wheels: [
    {
      url: 'https://x/coverage-7.0.0.whl',
      hash: `sha256:${LOCK_SHA}`,
      'upload-time': '2024-02-01T00:00:00Z',
    },
  ],
};

describe('LocalSimpleIndex', () => {
  const tmp = useTempDir();

  const readPage = (index: LocalSimpleIndex, dirName: string): Promise<string> =>
    fs.readFile(path.join(index.simpleDir, dirName, 'index.html'), 'utf-8');

  describe('create / url', () => {
    it('루트 아래 simple 디렉토리 생성', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      expect(index.simpleDir).toBe(path.join(tmp.path, 'simple'));
      expect(await fs.pathExists(index.simpleDir)).toBe(true);
    });

    it('url은 file URI이고 끝에 슬래시가 하나', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      expect(index.url).toBe(pathToFileURL(path.join(tmp.path, 'simple')).href + '/');
      expect(index.url.startsWith('file://')).toBe(true);
      expect(index.url.endsWith('simple/')).toBe(true);
    });
  });

  describe('packageDir', () => {
    it('정규화 결과가 같은 이름은 같은 디렉토리', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      const a = await index.packageDir('My.Pkg');
      const b = await index.packageDir('my_pkg');
      const c = await index.packageDir('MY-PKG');

      expect(a).toBe(path.join(index.simpleDir, 'my-pkg'));
      expect(b).toBe(a);
      expect(c).toBe(a);
      expect(await fs.readdir(index.simpleDir)).toEqual(['my-pkg']);
    });

    it('동시에 호출해도 실패하지 않음', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      const dirs = await Promise.all([index.packageDir('x.y'), index.packageDir('X_Y'), index.packageDir('x-y')]);
      expect(new Set(dirs).size).toBe(1);
    });
  });

  describe('addPackage', () => {
    it('demo-pkg 페이지에 wheel 앵커가 정확히 하나', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      const uploadTime = new Date(Date.UTC(2024, 4, 1));

      await index.addPackage('demo-pkg', '1.0.0', uploadTime);

      const html = await readPage(index, 'demo-pkg');
      const anchors: string[] = html.match(/<a [^>]*>[^<]*<\/a>/g) ?? [];
      expect(anchors).toHaveLength(1);

      const match = anchors[0].match(/^<a href="([^"#]+)#sha256=([0-9a-f]+)" data-upload-time="([^"]+)">([^<]+)<\/a>$/);
      expect(match).not.toBeNull();
      expect(match?.[1]).toBe('demo_pkg-1.0.0-py3-none-any.whl');
      expect(match?.[2]).toMatch(/^[0-9a-f]{64}$/);
      expect(match?.[3]).toBe('2024-05-01T00:00:00.000Z');
      expect(match?.[4]).toBe('demo_pkg-1.0.0-py3-none-any.whl');
    });

    it('페이지의 해시는 디스크의 wheel 바이트와 일치', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await index.addPackage('demo-pkg', '1.0.0', '2024-05-01T00:00:00Z');

      const [link] = index.links('demo-pkg');
      const bytes = await fs.readFile(path.join(index.simpleDir, 'demo-pkg', link.href));
      expect(link.sha256).toBe(crypto.createHash('sha256').update(bytes).digest('hex'));
    });

    it('다른 철자로 추가해도 같은 페이지에 누적', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await index.addPackage('Demo_Pkg', '1.0.0', 'T1');
      await index.addPackage('demo-pkg', '2.0.0', 'T2');

      expect(index.links('demo.pkg').map((link) => link.text)).toEqual([
        'Demo_Pkg-1.0.0-py3-none-any.whl',
        'demo_pkg-2.0.0-py3-none-any.whl',
      ]);
      expect(index.packages()).toEqual(['demo-pkg']);
    });

    it('같은 버전을 두 번 추가해도 중복을 걸러내지 않음', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await index.addPackage('coverage', '8.0.0', 'T-late');
      await index.addPackage('coverage', '8.0.0', 'T-early');

      const uploadTimes = index.links('coverage').map((link) => link.uploadTime);
      expect(uploadTimes).toEqual(['T-late', 'T-early']);
    });
  });

  describe('addLockedPackage', () => {
    it('lock의 URL과 해시로 앵커를 쓰고 로컬 wheel은 만들지 않음', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);

      const added = await index.addLockedPackage(coverageEntry);

      expect(added).toBe(1);
      expect(await readPage(index, 'coverage')).toBe(
        '<html><body>' +
          `<a href="https://x/coverage-7.0.0.whl#sha256=${LOCK_SHA}" data-upload-time="2024-02-01T00:00:00Z">coverage-7.0.0.whl</a>` +
          '</body></html>'
      );
      expect(await fs.readdir(path.join(index.simpleDir, 'coverage'))).toEqual(['index.html']);
    });

    it('wheel이 없으면 sdist로 링크 생성', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await index.addLockedPackage({
        name: 'legacy',
        sdist: { url: 'https://x/legacy-1.0.tar.gz', hash: `sha256:${LOCK_SHA}` },
      });

      expect(index.links('legacy')).toEqual([
        { href: 'https://x/legacy-1.0.tar.gz', sha256: LOCK_SHA, uploadTime: undefined, text: 'legacy-1.0.tar.gz' },
      ]);
    });

    it('아티팩트가 없는 엔트리는 아무 것도 바꾸지 않음', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);

      const added = await index.addLockedPackage({ name: 'my-project', version: '0.1.0', source: { virtual: '.' } });

      expect(added).toBe(0);
      expect(await fs.pathExists(path.join(index.simpleDir, 'my-project'))).toBe(false);
      expect(index.packages()).toEqual([]);
    });

    it('아티팩트가 없는 엔트리는 기존 페이지도 그대로 둠', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await index.addLockedPackage(coverageEntry);
      const before = await readPage(index, 'coverage');

      await index.addLockedPackage({ name: 'coverage' });

      expect(await readPage(index, 'coverage')).toBe(before);
    });

    it('필수 필드가 없으면 형태 에러를 전파', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await expect(index.addLockedPackage({ wheels: [] })).rejects.toBeInstanceOf(LockEntryShapeError);
      await expect(
        index.addLockedPackage({ name: 'coverage', wheels: [{ url: 'https://x/c.whl' }] })
      ).rejects.toBeInstanceOf(LockEntryShapeError);
      expect(index.packages()).toEqual([]);
    });
  });

  describe('순서와 렌더링', () => {
    it('addPackage 후 addLockedPackage 순서대로 앵커가 나열됨', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await index.addPackage('coverage', '8.0.0', 'T-built');
      await index.addLockedPackage(coverageEntry);

      const html = await readPage(index, 'coverage');
      const builtAt = html.indexOf('coverage-8.0.0-py3-none-any.whl');
      const lockedAt = html.indexOf('https://x/coverage-7.0.0.whl');
      expect(builtAt).toBeGreaterThan(-1);
      expect(lockedAt).toBeGreaterThan(builtAt);
    });

    it('같은 링크 목록으로 두 번 렌더링하면 같은 바이트', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await index.addPackage('demo-pkg', '1.0.0', 'T');

      const first = await index.renderPage('demo-pkg');
      const second = await index.renderPage('demo-pkg');
      expect(second).toBe(first);
      expect(await readPage(index, 'demo-pkg')).toBe(first);
    });

    it('루트 페이지는 패키지 목록', async () => {
      const index = await LocalSimpleIndex.create(tmp.path);
      await index.addLockedPackage(coverageEntry);
      await index.addPackage('demo-pkg', '1.0.0', 'T');

      await index.writeRootIndex();

      expect(await fs.readFile(path.join(index.simpleDir, 'index.html'), 'utf-8')).toBe(
        '<html><body><a href="coverage/">coverage</a><a href="demo-pkg/">demo-pkg</a></body></html>'
      );
    });
  });

  describe('open', () => {
    it('기존 페이지의 링크를 복원하고 이어서 추가', async () => {
      const first = await LocalSimpleIndex.create(tmp.path);
      await first.addLockedPackage(coverageEntry);
      await first.writeRootIndex();

      const reopened = await LocalSimpleIndex.open(tmp.path);
      expect(reopened.links('coverage')).toEqual(first.links('coverage'));

      await reopened.addPackage('coverage', '8.0.0', 'T');
      expect(reopened.links('coverage').map((link) => link.text)).toEqual([
        'coverage-7.0.0.whl',
        'coverage-8.0.0-py3-none-any.whl',
      ]);
    });

    it('비어 있는 루트도 열 수 있음', async () => {
      const index = await LocalSimpleIndex.open(path.join(tmp.path, 'fresh'));
      expect(index.packages()).toEqual([]);
    });
  });
});
