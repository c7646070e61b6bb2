import chalk from 'chalk';
import Table from 'cli-table3';
import * as path from 'path';
import { LocalSimpleIndex, PACKAGE_PAGE } from '../../core/simple-index/local-simple-index';
import { seedIndexFromLock } from '../../core/harness/uv-lock';
import { formatUploadTime } from '../../core/simple-index/simple-page-html';

export interface IndexOptions {
  index: string;
}

export interface AddOptions extends IndexOptions {
  uploadTime?: string;
}

export interface SeedOptions extends IndexOptions {
  lock: string;
}

/**
 * 인덱스 URL 출력
 */
export async function urlCommand(options: IndexOptions): Promise<void> {
  const index = await LocalSimpleIndex.create(options.index);
  console.log(index.url);
}

/**
 * wheel을 만들어 인덱스에 추가
 */
export async function addCommand(name: string, version: string, options: AddOptions): Promise<void> {
  const index = await LocalSimpleIndex.open(options.index);
  const uploadTime = options.uploadTime ?? new Date();

  await index.addPackage(name, version, uploadTime);

  console.log(chalk.green(`✓ ${name} ${version} 추가됨`));
  console.log(chalk.gray(`  업로드 시각: ${formatUploadTime(uploadTime)}`));
  console.log(chalk.gray(`  링크 수: ${index.links(name).length}`));
}

/**
 * uv.lock의 패키지로 인덱스 구성
 */
export async function seedCommand(options: SeedOptions): Promise<void> {
  const index = await LocalSimpleIndex.open(options.index);
  const seeded = await seedIndexFromLock(index, path.resolve(options.lock));

  console.log(chalk.green(`✓ ${seeded}개 패키지 등록`));
}

/**
 * 인덱스에 있는 패키지 목록
 */
export async function listCommand(options: IndexOptions): Promise<void> {
  const index = await LocalSimpleIndex.open(options.index);
  const packages = index.packages();

  if (packages.length === 0) {
    console.log(chalk.yellow('등록된 패키지가 없습니다'));
    return;
  }

  const table = new Table({
    head: [chalk.cyan('패키지'), chalk.cyan('링크 수'), chalk.cyan('마지막 파일')],
  });

  for (const name of packages) {
    const links = index.links(name);
    const last = links[links.length - 1];
    table.push([name, String(links.length), last ? last.text : '-']);
  }

  console.log(chalk.cyan(`\n${index.url}\n`));
  console.log(table.toString());
}

/**
 * simple/index.html 작성
 */
export async function rootCommand(options: IndexOptions): Promise<void> {
  const index = await LocalSimpleIndex.open(options.index);
  await index.writeRootIndex();

  console.log(chalk.green(`✓ ${path.join(index.simpleDir, PACKAGE_PAGE)}`));
}
