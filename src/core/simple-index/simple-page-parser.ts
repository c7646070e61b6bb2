/**
 * simple 페이지 HTML 파싱
 * 이미 기록된 인덱스를 다시 열 때 링크 목록을 복원한다.
 */

import { LinkRecord } from '../../types';

/**
 * HTML 엔티티 디코딩 (&gt; -> >, &lt; -> <, etc.)
 */
export function unescapeHtml(value: string): string {
  return value
    .replace(/&gt;/g, '>')
    .replace(/&lt;/g, '<')
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, '&');
}

/**
 * PEP 503 형식 페이지 파싱: <a href="url#sha256=..." data-upload-time="...">filename</a>
 * sha256 프래그먼트가 없는 앵커는 건너뛴다.
 */
export function parseSimplePage(html: string): LinkRecord[] {
  const links: LinkRecord[] = [];
  const linkPattern = /<a\s+([^>]*)>([^<]*)<\/a>/gi;

  let match;
  while ((match = linkPattern.exec(html)) !== null) {
    const attributes = match[1];
    const text = unescapeHtml(match[2]);

    const hrefMatch = attributes.match(/href="([^"]*)"/i);
    if (!hrefMatch) continue;

    // URL에서 해시 분리 (#sha256=... 형식)
    const fullUrl = unescapeHtml(hrefMatch[1]);
    const hashMatch = fullUrl.match(/^(.*)#sha256=([0-9a-fA-F]+)$/);
    if (!hashMatch) continue;

    const uploadTimeMatch = attributes.match(/data-upload-time="([^"]*)"/i);

    const link: LinkRecord = {
      href: hashMatch[1],
      sha256: hashMatch[2],
      text,
    };
    if (uploadTimeMatch) {
      link.uploadTime = unescapeHtml(uploadTimeMatch[1]);
    }
    links.push(link);
  }

  return links;
}
