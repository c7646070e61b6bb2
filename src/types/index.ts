// ============================================
// 인덱스 관련 타입
// ============================================

/**
 * 업로드 시각
 * Date는 ISO 8601 문자열로, 문자열은 그대로 페이지에 기록된다.
 */
export type UploadTime = Date | string;

/** 패키지 페이지의 링크 한 줄 */
export interface LinkRecord {
  /** 로컬 파일명 또는 외부 URL (해시 프래그먼트 제외) */
  href: string;
  /** 파일 전체의 sha256 (hex) */
  sha256: string;
  /** lock 엔트리에 업로드 시각이 없으면 undefined */
  uploadTime?: UploadTime;
  /** 앵커 텍스트 */
  text: string;
}

/** 로컬에서 만든 wheel */
export interface BuiltWheel {
  filename: string;
  path: string;
  sha256: string;
}

/** wheel 안에 들어가는 파일 하나 */
export interface ArchiveEntry {
  name: string;
  data: Buffer;
}

// ============================================
// 하네스 관련 타입
// ============================================

/** 업그레이드 시나리오 결과 */
export interface UpgradeScenarioResult {
  packageName: string;
  currentVersion: string;
  targetVersion: string;
  excludeNewer: Date;
  indexUrl: string;
  projectDir: string;
}
