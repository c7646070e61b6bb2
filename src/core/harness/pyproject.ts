/**
 * pyproject.toml에서 uv 설정 읽기
 */

import * as fs from 'fs-extra';
import { parse as parseToml } from '@iarna/toml';
import { z } from 'zod';
import { ConfigShapeError, formatZodIssues } from '../errors';

const PyprojectSchema = z.object({
  tool: z.object({
    uv: z.object({
      'exclude-newer': z.union([z.string(), z.date()]),
    }),
  }),
});

/**
 * [tool.uv] exclude-newer 기준 시각
 * 이 시각보다 나중에 올라온 배포는 uv가 고르지 않는다.
 */
export async function getExcludeNewer(pyprojectPath: string): Promise<Date> {
  const result = PyprojectSchema.safeParse(parseToml(await fs.readFile(pyprojectPath, 'utf-8')));
  if (!result.success) {
    throw new ConfigShapeError(pyprojectPath, formatZodIssues(result.error));
  }

  const raw = result.data.tool.uv['exclude-newer'];
  const cutoff = raw instanceof Date ? raw : new Date(raw);
  if (Number.isNaN(cutoff.getTime())) {
    throw new ConfigShapeError(pyprojectPath, [`tool.uv.exclude-newer: 날짜 형식이 아닙니다 (${String(raw)})`]);
  }
  return cutoff;
}
