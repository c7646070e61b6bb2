import { describe, it, expect, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { NOOP_HOOK, copyProject, createIgnoreFilter, installNoopPreCommitHook } from './project-copy';
import { DEFAULT_SETTINGS } from '../config';
import { useTempDir } from '../../test-utils/temp-dir';
import { describeNotOnWindows } from '../../test-utils/platform';

describe('project-copy', () => {
  const tmp = useTempDir();

  describe('createIgnoreFilter', () => {
    const include = createIgnoreFilter(DEFAULT_SETTINGS.copyIgnorePatterns);

    it('이름이 정확히 같으면 제외', () => {
      expect(include('/repo/.venv')).toBe(false);
      expect(include('/repo/src/__pycache__')).toBe(false);
      expect(include('/repo/.git')).toBe(false);
    });

    it('와일드카드 패턴', () => {
      expect(include('/repo/src/mod.pyc')).toBe(false);
      expect(include('/repo/src/mod.py')).toBe(true);
    });

    it('부분 일치는 제외하지 않음', () => {
      expect(include('/repo/.gitignore')).toBe(true);
      expect(include('/repo/my.venv.txt')).toBe(true);
    });
  });

  describe('copyProject', () => {
    it('무시 패턴을 제외하고 복사', async () => {
      const repo = path.join(tmp.path, 'repo');
      await fs.outputFile(path.join(repo, 'pyproject.toml'), '[project]\n');
      await fs.outputFile(path.join(repo, 'src', 'pkg', '__init__.py'), '');
      await fs.outputFile(path.join(repo, 'src', 'pkg', '__pycache__', 'x.cpython-312.pyc'), 'x');
      await fs.outputFile(path.join(repo, 'src', 'pkg', 'stale.pyc'), 'x');
      await fs.outputFile(path.join(repo, '.venv', 'pyvenv.cfg'), 'x');
      await fs.outputFile(path.join(repo, '.git', 'HEAD'), 'ref: refs/heads/main\n');
      await fs.outputFile(path.join(repo, '.gitignore'), '.venv\n');

      const dest = path.join(tmp.path, 'work', 'repo');
      await copyProject(repo, dest, DEFAULT_SETTINGS.copyIgnorePatterns);

      expect((await fs.readdir(dest)).sort()).toEqual(['.gitignore', 'pyproject.toml', 'src']);
      expect(await fs.readdir(path.join(dest, 'src', 'pkg'))).toEqual(['__init__.py']);
    });
  });

  describeNotOnWindows('installNoopPreCommitHook', () => {
    it('git init 후 실행 가능한 빈 훅 설치', async () => {
      const runner = { run: vi.fn() };

      const hookPath = await installNoopPreCommitHook(tmp.path, runner);

      expect(runner.run).toHaveBeenCalledWith('git', ['init', '-q'], { cwd: tmp.path });
      expect(hookPath).toBe(path.join(tmp.path, '.git', 'hooks', 'pre-commit'));
      expect(await fs.readFile(hookPath, 'utf-8')).toBe(NOOP_HOOK);
      expect((await fs.stat(hookPath)).mode & 0o777).toBe(0o755);
    });
  });
});
