#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigManager, DEFAULT_SETTINGS } from '../core/config';
import { ConfigShapeError, HarnessError } from '../core/errors';
import logger from '../utils/logger';
import type { AddOptions, IndexOptions, SeedOptions } from './commands/simple-index';
import type { VerifyUpgradeOptions } from './commands/verify-upgrade';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('simple-index')
  .description(chalk.cyan('simple-index - 업그레이드 검증용 로컬 PEP 503 인덱스'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// 로거 초기화 (설정 파일이 깨져 있어도 config reset은 실행되어야 함)
program.hook('preAction', () => {
  const configManager = getConfigManager();
  configManager.ensureDirectories();

  let level = DEFAULT_SETTINGS.logLevel;
  let invalidSettings: ConfigShapeError | undefined;
  try {
    level = configManager.getSettings().logLevel;
  } catch (error) {
    if (!(error instanceof ConfigShapeError)) throw error;
    invalidSettings = error;
  }

  logger.initialize(configManager.getLogsDir(), level);
  if (invalidSettings) {
    logger.warn('설정 파일을 읽지 못해 기본 로그 레벨 사용', { error: invalidSettings.message });
  }
});

// url 명령어
program
  .command('url')
  .description('인덱스 URL 출력 (UV_INDEX_URL 값)')
  .requiredOption('-i, --index <dir>', '인덱스 루트 디렉토리')
  .action(async (options: IndexOptions) => {
    const { urlCommand } = await import('./commands/simple-index');
    await urlCommand(options);
  });

// add 명령어
program
  .command('add')
  .description('메타데이터만 있는 wheel을 만들어 인덱스에 추가')
  .argument('<name>', '패키지명')
  .argument('<version>', '버전')
  .requiredOption('-i, --index <dir>', '인덱스 루트 디렉토리')
  .option('-u, --upload-time <time>', 'data-upload-time 값 (기본값: 현재 시각)')
  .action(async (name: string, version: string, options: AddOptions) => {
    const { addCommand } = await import('./commands/simple-index');
    await addCommand(name, version, options);
  });

// seed 명령어
program
  .command('seed')
  .description('uv.lock에 고정된 패키지로 인덱스 구성')
  .requiredOption('-l, --lock <file>', 'uv.lock 경로')
  .requiredOption('-i, --index <dir>', '인덱스 루트 디렉토리')
  .action(async (options: SeedOptions) => {
    const { seedCommand } = await import('./commands/simple-index');
    await seedCommand(options);
  });

// list 명령어
program
  .command('list')
  .description('인덱스에 등록된 패키지 목록')
  .requiredOption('-i, --index <dir>', '인덱스 루트 디렉토리')
  .action(async (options: IndexOptions) => {
    const { listCommand } = await import('./commands/simple-index');
    await listCommand(options);
  });

// root 명령어
program
  .command('root')
  .description('패키지 목록 페이지(simple/index.html) 작성')
  .requiredOption('-i, --index <dir>', '인덱스 루트 디렉토리')
  .action(async (options: IndexOptions) => {
    const { rootCommand } = await import('./commands/simple-index');
    await rootCommand(options);
  });

// verify-upgrade 명령어
program
  .command('verify-upgrade')
  .description('업그레이드 명령이 exclude-newer 기준 시각을 지키는지 검증')
  .requiredOption('-p, --project <dir>', '검증할 프로젝트 루트')
  .option('-w, --work-dir <dir>', '작업 디렉토리 (기본값: 임시 디렉토리)')
  .option('--package <name>', '검증할 패키지 (기본값: 설정의 scenarioPackage)')
  .action(async (options: VerifyUpgradeOptions) => {
    const { verifyUpgradeCommand } = await import('./commands/verify-upgrade');
    await verifyUpgradeCommand(options);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경 (JSON 또는 문자열)')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

function reportError(error: unknown): void {
  if (error instanceof Error) {
    logger.logError(error, error instanceof HarnessError && error.step ? error.step : undefined);
    const step = error instanceof HarnessError && error.step ? ` [${error.step}]` : '';
    console.error(chalk.red(`오류${step}: ${error.message}`));
  } else {
    console.error(chalk.red(`오류: ${String(error)}`));
  }
  process.exit(1);
}

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  simple-index - 업그레이드 검증용 로컬 PEP 503 인덱스\n'));
  console.log('  사용법: simple-index <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    url             인덱스 URL 출력');
  console.log('    add             패키지 추가');
  console.log('    seed            uv.lock으로 인덱스 구성');
  console.log('    list            패키지 목록');
  console.log('    root            패키지 목록 페이지 작성');
  console.log('    verify-upgrade  업그레이드 검증');
  console.log('    config          설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    simple-index add coverage 8.0.0 -i ./tmp/index -u 2024-05-31T00:00:00Z'));
  console.log(chalk.gray('    simple-index seed -l uv.lock -i ./tmp/index'));
  console.log(chalk.gray('    simple-index verify-upgrade -p .'));
  console.log('\n  자세한 내용: simple-index --help\n');
} else {
  // 파싱 및 실행
  program.parseAsync(process.argv).catch(reportError);
}
