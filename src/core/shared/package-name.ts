/**
 * 패키지 이름 규칙
 *
 * 두 가지 정규화를 구분한다.
 * - 인덱스 경로용 (PEP 503): 소문자 + `-_.` 연속을 `-` 하나로
 * - 배포 식별자용 (wheel 파일명, dist-info 디렉토리): `-` 만 `_` 로
 *
 * https://peps.python.org/pep-0503/#normalized-names
 */

/** wheel 호환성 태그 (순수 파이썬, 모든 플랫폼) */
export const UNIVERSAL_WHEEL_TAG = 'py3-none-any';

/**
 * PEP 503 패키지 이름 정규화
 * 예: My.Pkg, my_pkg, MY-PKG -> my-pkg
 */
export function normalizePackageName(name: string): string {
  return name.replace(/[-_.]+/g, '-').toLowerCase();
}

/**
 * wheel 내부 배포 식별자
 * 예: demo-pkg -> demo_pkg
 */
export function toDistributionId(name: string): string {
  return name.replace(/-/g, '_');
}

/**
 * 범용 wheel 파일명
 * 예: (demo-pkg, 1.0.0) -> demo_pkg-1.0.0-py3-none-any.whl
 */
export function universalWheelFilename(name: string, version: string): string {
  return `${toDistributionId(name)}-${version}-${UNIVERSAL_WHEEL_TAG}.whl`;
}

/**
 * dist-info 디렉토리 이름
 */
export function distInfoDirName(name: string, version: string): string {
  return `${toDistributionId(name)}-${version}.dist-info`;
}
