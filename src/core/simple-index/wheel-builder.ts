/**
 * 메타데이터만 있는 최소 wheel 생성기
 * 리졸버가 버전을 고르고 설치기가 설치할 수 있을 만큼만 채운다.
 *
 * 참고:
 * - https://peps.python.org/pep-0427/ (Wheel 형식)
 * - https://packaging.python.org/en/latest/specifications/recording-installed-packages/ (RECORD)
 */

import archiver from 'archiver';
import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ArchiveEntry, BuiltWheel } from '../../types';
import logger from '../../utils/logger';
import {
  UNIVERSAL_WHEEL_TAG,
  distInfoDirName,
  toDistributionId,
  universalWheelFilename,
} from '../shared/package-name';

/** WHEEL 파일의 Generator 값 */
export const WHEEL_GENERATOR = 'simple-index-harness';

// ZIP 엔트리 시각을 고정해 같은 입력이면 같은 바이트가 나오게 한다
const ENTRY_DATE = new Date(1980, 0, 1);

/**
 * RECORD용 해시: urlsafe base64, 패딩 없음
 */
export function recordDigest(data: Buffer): string {
  return crypto.createHash('sha256').update(data).digest('base64url');
}

/**
 * 파일 전체 sha256 (hex)
 */
export function sha256Hex(data: Buffer): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * wheel에 들어갈 파일 목록을 순서대로 만든다. 마지막은 RECORD.
 */
export function wheelFiles(name: string, version: string): ArchiveEntry[] {
  const distId = toDistributionId(name);
  const distInfo = distInfoDirName(name, version);

  const metadata = ['Metadata-Version: 2.1', `Name: ${name}`, `Version: ${version}`, ''].join('\n');
  const wheelMetadata = [
    'Wheel-Version: 1.0',
    `Generator: ${WHEEL_GENERATOR}`,
    'Root-Is-Purelib: true',
    `Tag: ${UNIVERSAL_WHEEL_TAG}`,
    '',
  ].join('\n');

  const entries: ArchiveEntry[] = [
    { name: `${distId}/__init__.py`, data: Buffer.alloc(0) },
    { name: `${distInfo}/METADATA`, data: Buffer.from(metadata, 'utf-8') },
    { name: `${distInfo}/WHEEL`, data: Buffer.from(wheelMetadata, 'utf-8') },
    { name: `${distInfo}/top_level.txt`, data: Buffer.from(`${name}\n`, 'utf-8') },
  ];

  const recordRows = entries.map(
    (entry) => `${entry.name},sha256=${recordDigest(entry.data)},${entry.data.length}`
  );
  // RECORD 자신은 해시와 크기를 비워 둔다
  recordRows.push(`${distInfo}/RECORD,,`);

  entries.push({
    name: `${distInfo}/RECORD`,
    data: Buffer.from(recordRows.join('\n') + '\n', 'utf-8'),
  });

  return entries;
}

/**
 * 엔트리들을 ZIP으로 기록
 */
function writeZip(entries: ArchiveEntry[], outputPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = fs.createWriteStream(outputPath);
    const archive = archiver('zip', {
      zlib: { level: 9 },
    });

    output.on('close', () => resolve());
    output.on('error', (err) => reject(err));
    archive.on('error', (err) => reject(err));

    archive.pipe(output);
    for (const entry of entries) {
      archive.append(entry.data, { name: entry.name, date: ENTRY_DATE });
    }
    archive.finalize().catch(reject);
  });
}

/**
 * 패키지 디렉토리에 wheel을 만들고 파일명과 전체 해시를 반환
 * @param packageDir wheel을 둘 인덱스 하위 디렉토리
 */
export async function buildWheel(
  packageDir: string,
  name: string,
  version: string
): Promise<BuiltWheel> {
  const filename = universalWheelFilename(name, version);
  const wheelPath = path.join(packageDir, filename);

  await fs.ensureDir(packageDir);
  await writeZip(wheelFiles(name, version), wheelPath);

  // 다 쓴 뒤의 바이트로 해시를 계산
  const sha256 = sha256Hex(await fs.readFile(wheelPath));

  logger.debug('wheel 생성 완료', { name, version, wheelPath, sha256 });

  return { filename, path: wheelPath, sha256 };
}
