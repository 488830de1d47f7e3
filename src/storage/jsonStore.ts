import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import type { z } from 'zod';
import { log } from '../log';

/**
 * Reads a JSON document and validates it. A missing file yields `fallback`;
 * an unreadable or invalid one is logged and also yields `fallback`.
 */
export async function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): Promise<T> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code !== 'ENOENT') {
      log.error({ event: 'json_store_read_failed', file_path: filePath, err: error }, 'json store read failed');
    }
    return fallback;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    log.error({ event: 'json_store_parse_failed', file_path: filePath, err: error }, 'json store parse failed');
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    log.error(
      {
        event: 'json_store_invalid',
        file_path: filePath,
        issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
      'json store invalid',
    );
    return fallback;
  }
  return parsed.data;
}

/** Write-then-rename so readers never observe a half-written file. */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);

  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(tmpPath, JSON.stringify(value, null, 2));
  try {
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}
