import fs from 'fs-extra';
import path from 'path';
import { randomUUID } from 'crypto';

/**
 * Write through a sibling temp file and rename it over the target, so an
 * interrupted write leaves the original content in place.
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
    const dir = path.dirname(filePath);
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID().slice(0, 8)}.tmp`);

    try {
        await fs.writeFile(tempPath, content);
        if (await fs.pathExists(filePath)) {
            const { mode } = await fs.stat(filePath);
            await fs.chmod(tempPath, mode);
        }
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.remove(tempPath);
        throw error;
    }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
    await writeFileAtomic(filePath, JSON.stringify(value, null, 2) + '\n');
}
