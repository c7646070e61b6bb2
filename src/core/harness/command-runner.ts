/**
 * 외부 명령 실행기
 * 셸을 거치지 않고 실행 파일과 인자 배열로 실행하며, 끝날 때까지 기다린다.
 * 0이 아닌 종료 코드나 신호에 의한 종료는 재시도 없이 CommandFailedError로 던진다.
 */

import { spawnSync } from 'child_process';
import { CommandFailedError, HarnessError } from '../errors';
import logger from '../../utils/logger';

export interface CommandOptions {
  /** 작업 디렉토리 */
  cwd?: string;
  /** 전체 환경변수 (병합하지 않음) */
  env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): void;
}

export function createCommandRunner(): CommandRunner {
  return {
    run(command: string, args: string[], options: CommandOptions = {}): void {
      const { cwd, env } = options;
      logger.debug(`실행: ${[command, ...args].join(' ')}`, { cwd });

      const result = spawnSync(command, args, {
        cwd,
        env,
        stdio: 'inherit',
      });

      if (result.error) {
        throw new CommandFailedError(command, args, null, { cwd, cause: result.error });
      }
      if (result.status !== 0) {
        throw new CommandFailedError(command, args, result.status, {
          cwd,
          signal: result.signal ?? undefined,
        });
      }
    },
  };
}

/**
 * ["just", "upgrade-all"] 형태의 명령 배열 실행
 */
export function runCommandLine(
  runner: CommandRunner,
  commandLine: readonly string[],
  options?: CommandOptions
): void {
  const [command, ...args] = commandLine;
  if (!command) {
    throw new HarnessError('실행할 명령이 비어 있습니다');
  }
  runner.run(command, args, options);
}
