import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isSettingKey, SettingKey } from '../../core/config';
import { HarnessError } from '../../core/errors';

const DESCRIPTIONS: Record<SettingKey, string> = {
  lockFileName: 'lock 파일 이름',
  pyprojectFileName: 'pyproject 파일 이름',
  mirrorRequirementsFile: '미러 requirements 파일',
  syncCommand: '동기화 명령',
  upgradeCommand: '업그레이드 명령',
  scenarioPackage: '검증할 패키지',
  copyIgnorePatterns: '복사 제외 패턴',
  logLevel: '로그 레벨',
};

/**
 * 명령행 값 파싱 (JSON이 아니면 문자열 그대로)
 */
export function parseSettingValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const settings = getConfigManager().getSettings();

  if (key) {
    if (isSettingKey(key)) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(settings[key])));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(settings, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  if (!isSettingKey(key)) {
    throw new HarnessError(`알 수 없는 설정: ${key}`);
  }

  const parsedValue = parseSettingValue(value);
  getConfigManager().set(key, parsedValue);
  console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();
  const settings = configManager.getSettings();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [25, 40, 25],
  });

  for (const [key, value] of Object.entries(settings)) {
    table.push([key, JSON.stringify(value), isSettingKey(key) ? DESCRIPTIONS[key] : '-']);
  }

  console.log(chalk.cyan(`\n설정 목록 (${configManager.getConfigDir()}):\n`));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  getConfigManager().reset();
  console.log(chalk.green('✓ 설정이 초기화되었습니다'));
}
