/**
 * 하네스 에러 분류
 * - 형태 에러: lock 엔트리나 설정 파일에 필요한 필드가 없음
 * - 외부 프로세스 에러: uv, just, git 등이 0이 아닌 코드로 종료
 * - 시나리오 단정 실패: lock 파일이 기대한 버전을 고정하지 않음
 * 파일시스템 에러는 감싸지 않고 그대로 전파한다.
 */

import type { ZodError } from 'zod';

export class HarnessError extends Error {
  /** 시나리오 안에서 실패한 단계 이름 */
  step?: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * zod 이슈를 "경로: 메시지" 목록으로 변환
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
}

export class LockEntryShapeError extends HarnessError {
  readonly details: string[];

  constructor(error: ZodError, entryName?: string) {
    const details = formatZodIssues(error);
    const subject = entryName ? ` (${entryName})` : '';
    super(`잘못된 lock 엔트리${subject}: ${details.join('; ')}`);
    this.details = details;
  }
}

export class ConfigShapeError extends HarnessError {
  readonly source: string;

  constructor(source: string, details: string[]) {
    super(`잘못된 설정 (${source}): ${details.join('; ')}`);
    this.source = source;
  }
}

export class CommandFailedError extends HarnessError {
  readonly command: string;
  readonly args: string[];
  readonly cwd?: string;
  /** 시작하지 못했거나 신호로 종료된 경우 null */
  readonly exitCode: number | null;
  /** 프로세스를 종료시킨 신호 */
  readonly signal?: NodeJS.Signals;

  constructor(
    command: string,
    args: string[],
    exitCode: number | null,
    options: { cwd?: string; cause?: unknown; signal?: NodeJS.Signals } = {}
  ) {
    const commandLine = [command, ...args].join(' ');
    let reason = `종료 코드 ${exitCode}`;
    if (exitCode === null) {
      reason = options.signal ? `신호 ${options.signal}로 종료` : '실행 실패';
    }
    super(`명령 실패: ${commandLine} (${reason})`, { cause: options.cause });
    this.command = command;
    this.args = args;
    this.cwd = options.cwd;
    this.exitCode = exitCode;
    this.signal = options.signal;
  }
}

export class LockedVersionMismatchError extends HarnessError {
  readonly packageName: string;
  readonly expected: string;
  readonly actual?: string;

  constructor(packageName: string, expected: string, actual: string | undefined, where: string) {
    super(
      `${where}의 ${packageName} 버전 불일치: 기대 ${expected}, 실제 ${actual ?? '없음'}`
    );
    this.packageName = packageName;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * 시나리오 단계 이름을 에러에 붙여 다시 던질 수 있게 한다.
 */
export function withStep(error: unknown, step: string): unknown {
  if (error instanceof HarnessError && !error.step) {
    error.step = step;
  }
  return error;
}
