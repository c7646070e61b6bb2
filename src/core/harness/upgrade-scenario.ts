/**
 * 의존성 업그레이드 명령 검증 시나리오
 *
 * 프로젝트 복사본을 로컬 인덱스에 연결하고, exclude-newer 기준 시각 앞뒤로
 * 새 메이저 버전을 올려 가며 업그레이드 명령이 기준 시각을 지키는지 확인한다.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { CommandRunner, createCommandRunner, runCommandLine } from './command-runner';
import { copyProject, installNoopPreCommitHook } from './project-copy';
import { getExcludeNewer } from './pyproject';
import { assertLockedVersion, loadLockedVersions, seedIndexFromLock } from './uv-lock';
import { buildUvEnvironment } from './uv-environment';
import { DEFAULT_SETTINGS, Settings } from '../config';
import { HarnessError, withStep } from '../errors';
import { LocalSimpleIndex } from '../simple-index/local-simple-index';
import { UpgradeScenarioResult } from '../../types';
import logger from '../../utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ScenarioStep =
  | 'prepare-project'
  | 'seed-index'
  | 'read-versions'
  | 'no-new-version'
  | 'newer-than-cutoff'
  | 'older-than-cutoff';

export interface UpgradeScenarioOptions {
  /** 검증할 프로젝트 루트 (복사해서 쓰고 원본은 건드리지 않음) */
  projectDir: string;
  /** 복사본, 인덱스, uv 캐시를 둘 디렉토리 (기본값: 새 임시 디렉토리) */
  workDir?: string;
  /** 기본값: settings.scenarioPackage */
  packageName?: string;
  settings?: Settings;
  runner?: CommandRunner;
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * 현재 버전의 다음 메이저 (7.6.1 -> 8.0.0)
 */
export function nextMajorVersion(version: string): string {
  const major = Number.parseInt(version.split('.')[0], 10);
  if (Number.isNaN(major)) {
    throw new HarnessError(`메이저 버전을 알 수 없습니다: ${version}`);
  }
  return `${major + 1}.0.0`;
}

async function runStep<T>(step: ScenarioStep, action: () => Promise<T>): Promise<T> {
  logger.info(`[${step}] 시작`);
  try {
    const result = await action();
    logger.info(`[${step}] 완료`);
    return result;
  } catch (error) {
    logger.error(`[${step}] 실패`, { error: error instanceof Error ? error.message : String(error) });
    throw withStep(error, step);
  }
}

export async function runUpgradeScenario(options: UpgradeScenarioOptions): Promise<UpgradeScenarioResult> {
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const runner = options.runner ?? createCommandRunner();
  const packageName = options.packageName ?? settings.scenarioPackage;
  const workDir = options.workDir ?? (await fs.mkdtemp(path.join(os.tmpdir(), 'simple-index-')));
  await fs.ensureDir(workDir);

  const files = {
    lockFileName: settings.lockFileName,
    mirrorRequirementsFile: settings.mirrorRequirementsFile,
  };
  const cacheDir = path.join(workDir, 'uv-cache');
  const projectDir = path.join(workDir, 'repo');

  logger.info('업그레이드 시나리오 시작', { project: options.projectDir, workDir, packageName });

  await runStep('prepare-project', async () => {
    await copyProject(options.projectDir, projectDir, settings.copyIgnorePatterns);
    await installNoopPreCommitHook(projectDir, runner);
    // 현재 고정된 버전을 캐시에 받아 두면 인덱스는 메타데이터만 제공하면 된다
    runCommandLine(runner, settings.syncCommand, {
      cwd: projectDir,
      env: buildUvEnvironment({ baseEnv: options.baseEnv, cacheDir }),
    });
  });

  const index = await runStep('seed-index', async () => {
    const created = await LocalSimpleIndex.create(path.join(workDir, 'index'));
    await seedIndexFromLock(created, path.join(projectDir, settings.lockFileName));
    return created;
  });

  const { cutoff, currentVersion, targetVersion } = await runStep('read-versions', async () => {
    const excludeNewer = await getExcludeNewer(path.join(projectDir, settings.pyprojectFileName));
    const versions = await loadLockedVersions(path.join(projectDir, settings.lockFileName));
    const current = versions.get(packageName);
    if (!current) {
      throw new HarnessError(`${settings.lockFileName}에 ${packageName} 패키지가 없습니다`);
    }
    return { cutoff: excludeNewer, currentVersion: current, targetVersion: nextMajorVersion(current) };
  });

  const upgradeEnv = buildUvEnvironment({ baseEnv: options.baseEnv, cacheDir, indexUrl: index.url });
  const upgrade = (): void => {
    runCommandLine(runner, settings.upgradeCommand, { cwd: projectDir, env: upgradeEnv });
  };

  // 인덱스에 새 버전이 없으면 그대로
  await runStep('no-new-version', async () => {
    await assertLockedVersion(projectDir, packageName, currentVersion, files);
    upgrade();
    await assertLockedVersion(projectDir, packageName, currentVersion, files);
  });

  // 기준 시각보다 늦게 올라온 버전은 무시되어야 함
  await runStep('newer-than-cutoff', async () => {
    await index.addPackage(packageName, targetVersion, new Date(cutoff.getTime() + DAY_MS));
    upgrade();
    await assertLockedVersion(projectDir, packageName, currentVersion, files);
  });

  // 기준 시각 이전 버전이 생기면 업그레이드
  await runStep('older-than-cutoff', async () => {
    await index.addPackage(packageName, targetVersion, new Date(cutoff.getTime() - DAY_MS));
    upgrade();
    await assertLockedVersion(projectDir, packageName, targetVersion, files);
  });

  logger.info('업그레이드 시나리오 통과', { packageName, currentVersion, targetVersion });

  return {
    packageName,
    currentVersion,
    targetVersion,
    excludeNewer: cutoff,
    indexUrl: index.url,
    projectDir,
  };
}
