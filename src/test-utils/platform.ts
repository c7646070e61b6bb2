/// <reference types="vitest/globals" />

/**
 * 플랫폼별 테스트 유틸리티
 * 파일 권한 비트처럼 Windows에 없는 동작을 다루는 테스트에 쓴다.
 */

export const isWindows = process.platform === 'win32';

/**
 * Windows가 아닌 환경에서만 테스트 실행
 */
export const describeNotOnWindows: typeof describe.skip = !isWindows ? describe : describe.skip;
