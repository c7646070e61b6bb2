/**
 * 파일 기반 로컬 PEP 503 simple 인덱스
 *
 * 패키지마다 정규화된 이름의 디렉토리를 두고, 그 안에 링크 목록을 담은
 * index.html을 쓴다. 링크가 추가될 때마다 해당 패키지 페이지 전체를 다시 쓴다.
 *
 * - addPackage(): 메타데이터만 있는 wheel을 만들어 링크를 추가
 * - addLockedPackage(): uv.lock에 기록된 아티팩트 URL과 해시로 링크만 추가
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { LinkRecord, UploadTime } from '../../types';
import logger from '../../utils/logger';
import { normalizePackageName } from '../shared/package-name';
import {
  artifactFilename,
  hashDigest,
  lockedArtifacts,
  parseLockEntry,
} from './lock-entry';
import { renderPackagePage, renderRootPage } from './simple-page-html';
import { parseSimplePage } from './simple-page-parser';
import { buildWheel } from './wheel-builder';

export const PACKAGE_PAGE = 'index.html';

export class LocalSimpleIndex {
  readonly simpleDir: string;
  // 정규화된 이름 -> 추가된 순서의 링크 목록
  private readonly packageLinks = new Map<string, LinkRecord[]>();

  private constructor(root: string) {
    this.simpleDir = path.join(path.resolve(root), 'simple');
  }

  /**
   * 빈 인덱스 생성
   * @param root 인덱스 루트 (simple/ 디렉토리가 그 아래 만들어짐)
   */
  static async create(root: string): Promise<LocalSimpleIndex> {
    const index = new LocalSimpleIndex(root);
    await fs.ensureDir(index.simpleDir);
    return index;
  }

  /**
   * 기존 인덱스 열기
   * 이미 기록된 패키지 페이지에서 링크 목록을 복원한다.
   */
  static async open(root: string): Promise<LocalSimpleIndex> {
    const index = await LocalSimpleIndex.create(root);
    const names = await fs.readdir(index.simpleDir);

    for (const name of names) {
      // 루트 index.html 같은 파일은 건너뛴다
      const pagePath = path.join(index.simpleDir, name, PACKAGE_PAGE);
      if (!(await fs.pathExists(pagePath))) continue;

      const links = parseSimplePage(await fs.readFile(pagePath, 'utf-8'));
      index.packageLinks.set(normalizePackageName(name), links);
    }

    logger.debug('기존 인덱스 로드', {
      simpleDir: index.simpleDir,
      packages: index.packageLinks.size,
    });
    return index;
  }

  /**
   * 리졸버의 index-url로 바로 쓸 수 있는 file URI (끝에 `/` 하나)
   */
  get url(): string {
    return pathToFileURL(this.simpleDir).href.replace(/\/+$/, '') + '/';
  }

  /**
   * 정규화된 패키지 디렉토리를 만들고 경로를 반환
   * 이미 있어도 실패하지 않는다.
   */
  async packageDir(name: string): Promise<string> {
    const pkgDir = path.join(this.simpleDir, normalizePackageName(name));
    await fs.ensureDir(pkgDir);
    return pkgDir;
  }

  /**
   * 패키지의 현재 링크 목록 (복사본)
   */
  links(name: string): LinkRecord[] {
    return [...(this.packageLinks.get(normalizePackageName(name)) ?? [])];
  }

  /**
   * 링크가 있는 패키지 이름 (정규화, 정렬)
   */
  packages(): string[] {
    return Array.from(this.packageLinks.keys()).sort();
  }

  /**
   * wheel을 만들어 인덱스에 추가
   * @param uploadTime data-upload-time에 그대로 기록되는 값
   */
  async addPackage(name: string, version: string, uploadTime: UploadTime): Promise<void> {
    const wheel = await buildWheel(await this.packageDir(name), name, version);

    this.appendLinks(name, [
      { href: wheel.filename, sha256: wheel.sha256, uploadTime, text: wheel.filename },
    ]);
    await this.renderPage(name);

    logger.info('패키지 추가', { name, version, filename: wheel.filename });
  }

  /**
   * uv.lock에 이미 있는 패키지의 링크 추가
   *
   * 리졸버가 버전을 볼 수 있도록 페이지만 쓰고 wheel은 만들지 않는다.
   * 업로드 시각은 lock에 기록된 값을 쓴다.
   * 아티팩트가 없는 엔트리(프로젝트 자신 같은 가상 패키지)는 무시한다.
   *
   * @returns 추가된 링크 수
   */
  async addLockedPackage(lockEntry: unknown): Promise<number> {
    const entry = parseLockEntry(lockEntry);
    const artifacts = lockedArtifacts(entry);
    if (artifacts.length === 0) {
      logger.debug('아티팩트 없는 lock 엔트리 건너뜀', { name: entry.name });
      return 0;
    }

    const links: LinkRecord[] = artifacts.map((artifact) => ({
      href: artifact.url,
      sha256: hashDigest(artifact.hash),
      uploadTime: artifact['upload-time'],
      text: artifactFilename(artifact.url),
    }));

    this.appendLinks(entry.name, links);
    await this.renderPage(entry.name);

    logger.debug('lock 패키지 추가', { name: entry.name, links: links.length });
    return links.length;
  }

  /**
   * 패키지 페이지를 현재 링크 목록으로 덮어쓴다
   * @returns 기록한 HTML
   */
  async renderPage(name: string): Promise<string> {
    const pkgDir = await this.packageDir(name);
    const html = renderPackagePage(this.links(name));
    await fs.writeFile(path.join(pkgDir, PACKAGE_PAGE), html, 'utf-8');
    return html;
  }

  /**
   * simple/index.html에 패키지 목록 페이지를 쓴다
   */
  async writeRootIndex(): Promise<string> {
    const html = renderRootPage(this.packages());
    await fs.writeFile(path.join(this.simpleDir, PACKAGE_PAGE), html, 'utf-8');
    return html;
  }

  private appendLinks(name: string, links: LinkRecord[]): void {
    const key = normalizePackageName(name);
    const existing = this.packageLinks.get(key) ?? [];
    existing.push(...links);
    this.packageLinks.set(key, existing);
  }
}
