import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ConfigShapeError, formatZodIssues } from './errors';

// 명령은 실행 파일과 인자 배열로 둔다 (셸을 거치지 않음)
const CommandSchema = z.array(z.string().min(1)).min(1);

// 설정 스키마
export const SettingsSchema = z.object({
  // 프로젝트 파일
  lockFileName: z.string().min(1),
  pyprojectFileName: z.string().min(1),
  mirrorRequirementsFile: z.string().min(1),

  // 외부 명령
  syncCommand: CommandSchema,
  upgradeCommand: CommandSchema,

  // 시나리오
  scenarioPackage: z.string().min(1),
  copyIgnorePatterns: z.array(z.string().min(1)),

  // 기타 설정
  logLevel: z.enum(['error', 'warn', 'info', 'debug']),
});
export type Settings = z.infer<typeof SettingsSchema>;

// 기본 설정값
export const DEFAULT_SETTINGS: Settings = {
  lockFileName: 'uv.lock',
  pyprojectFileName: 'pyproject.toml',
  mirrorRequirementsFile: 'requirements.uvmirror.txt',
  syncCommand: ['uv', 'sync'],
  upgradeCommand: ['just', 'upgrade-all'],
  scenarioPackage: 'coverage',
  copyIgnorePatterns: ['.venv', 'htmlcov', '__pycache__', '*.pyc', '.git'],
  logLevel: 'info',
};

export type SettingKey = keyof Settings;

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  /**
   * @param configDir 기본값은 $SIMPLE_INDEX_HOME 또는 ~/.simple-index-harness
   */
  constructor(configDir?: string) {
    this.configDir =
      configDir ?? process.env.SIMPLE_INDEX_HOME ?? path.join(os.homedir(), '.simple-index-harness');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  ensureDirectories(): void {
    fs.ensureDirSync(this.configDir);
    fs.ensureDirSync(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 반환합니다.
   * 파일에 있는 항목만 기본값 위에 덮어쓰며, 형식이 틀리면 ConfigShapeError.
   */
  getSettings(): Settings {
    if (!fs.pathExistsSync(this.configPath)) {
      return { ...DEFAULT_SETTINGS };
    }

    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.configPath);
    } catch (error) {
      throw new ConfigShapeError(this.configPath, [error instanceof Error ? error.message : String(error)]);
    }

    const result = SettingsSchema.partial().strict().safeParse(raw);
    if (!result.success) {
      throw new ConfigShapeError(this.configPath, formatZodIssues(result.error));
    }
    return { ...DEFAULT_SETTINGS, ...result.data };
  }

  /**
   * 특정 설정값 조회
   */
  get<K extends SettingKey>(key: K): Settings[K] {
    return this.getSettings()[key];
  }

  /**
   * 설정값을 검증 후 저장합니다.
   */
  set(key: SettingKey, value: unknown): Settings {
    const next = { ...this.getSettings(), [key]: value };
    const result = SettingsSchema.strict().safeParse(next);
    if (!result.success) {
      throw new ConfigShapeError(key, formatZodIssues(result.error));
    }

    this.ensureDirectories();
    fs.writeJsonSync(this.configPath, result.data, { spaces: 2 });
    return result.data;
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  reset(): Settings {
    this.ensureDirectories();
    fs.writeJsonSync(this.configPath, DEFAULT_SETTINGS, { spaces: 2 });
    return { ...DEFAULT_SETTINGS };
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
