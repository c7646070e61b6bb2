import chalk from 'chalk';
import Table from 'cli-table3';
import * as path from 'path';
import { getConfigManager } from '../../core/config';
import { isInsideContainer } from '../../core/harness/uv-environment';
import { runUpgradeScenario } from '../../core/harness/upgrade-scenario';

export interface VerifyUpgradeOptions {
  project: string;
  workDir?: string;
  package?: string;
}

/**
 * 업그레이드 명령이 exclude-newer 기준 시각을 지키는지 검증
 */
export async function verifyUpgradeCommand(options: VerifyUpgradeOptions): Promise<void> {
  // 컨테이너 안에서는 devenv와 uv 캐시를 쓸 수 없다
  if (isInsideContainer()) {
    console.log(chalk.yellow('컨테이너 안에서는 업그레이드 검증을 건너뜁니다'));
    return;
  }

  const configManager = getConfigManager();
  const result = await runUpgradeScenario({
    projectDir: path.resolve(options.project),
    workDir: options.workDir ? path.resolve(options.workDir) : undefined,
    packageName: options.package,
    settings: configManager.getSettings(),
  });

  const table = new Table();
  table.push(
    { 패키지: result.packageName },
    { '현재 버전': result.currentVersion },
    { '대상 버전': result.targetVersion },
    { 'exclude-newer': result.excludeNewer.toISOString() },
    { 인덱스: result.indexUrl },
    { 복사본: result.projectDir }
  );

  console.log(chalk.green('\n✓ 업그레이드 검증 통과\n'));
  console.log(table.toString());
}
