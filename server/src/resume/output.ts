import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `resume_YYYYMMDD_HHMMSS.docx`, local time. Unique per second, which is
 * enough for a single interactive user.
 */
export function buildResumeFilename(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `resume_${date}_${time}.docx`;
}

/**
 * Write the document under `outputDir`, creating the directory if needed.
 * Returns the path written.
 */
export async function writeResumeFile(outputDir: string, filename: string, document: Buffer): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const target = path.join(outputDir, filename);
  await writeFile(target, document);
  return target;
}
