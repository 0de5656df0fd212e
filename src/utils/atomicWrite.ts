import { promises as fs } from 'fs';

/**
 * Writes a file by renaming a temp file into place, so readers never see a partial document.
 * Expects: parent directory exists.
 */
export async function atomicWrite(filePath: string, payload: string): Promise<void> {
  const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
  try {
    await fs.writeFile(tempPath, payload, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
