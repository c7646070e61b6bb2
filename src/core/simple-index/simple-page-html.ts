/**
 * PEP 503 simple 페이지 HTML 생성
 * 링크 목록만으로 결정되는 순수 함수. 같은 입력이면 같은 바이트를 낸다.
 */

import { LinkRecord, UploadTime } from '../../types';

/**
 * HTML 속성값/텍스트 이스케이프
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * 업로드 시각 직렬화
 * Date는 ISO 8601, 문자열은 그대로
 */
export function formatUploadTime(uploadTime: UploadTime): string {
  return uploadTime instanceof Date ? uploadTime.toISOString() : uploadTime;
}

/**
 * 링크 한 줄을 앵커로 변환
 * data-upload-time은 uv의 exclude-newer 판단에 쓰인다
 */
export function renderAnchor(link: LinkRecord): string {
  const href = escapeHtml(`${link.href}#sha256=${link.sha256}`);
  const uploadTime =
    link.uploadTime === undefined
      ? ''
      : ` data-upload-time="${escapeHtml(formatUploadTime(link.uploadTime))}"`;
  return `<a href="${href}"${uploadTime}>${escapeHtml(link.text)}</a>`;
}

/**
 * 패키지 페이지 HTML 생성
 */
export function renderPackagePage(links: readonly LinkRecord[]): string {
  const anchors = links.map(renderAnchor).join('');
  return `<html><body>${anchors}</body></html>`;
}

/**
 * 루트 페이지 HTML 생성 (패키지 목록)
 */
export function renderRootPage(packageNames: readonly string[]): string {
  const anchors = packageNames
    .map((name) => `<a href="${escapeHtml(name)}/">${escapeHtml(name)}</a>`)
    .join('');
  return `<html><body>${anchors}</body></html>`;
}
