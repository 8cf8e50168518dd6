import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import { glob } from 'glob';

export interface Utility {
    exists(filePath: string): Promise<boolean>;
    isDirectory(filePath: string): Promise<boolean>;
    isFile(filePath: string): Promise<boolean>;
    createDirectory(dirPath: string): Promise<void>;
    readFile(filePath: string, encoding: BufferEncoding): Promise<string>;
    writeFile(filePath: string, data: string | Buffer, encoding?: BufferEncoding): Promise<void>;
    /** Write through a sibling temp file and rename, so the final name never shows a partial file. */
    writeFileAtomic(filePath: string, data: string | Buffer, encoding?: BufferEncoding): Promise<void>;
    deleteFile(filePath: string): Promise<void>;
    readStream(filePath: string): Promise<fs.ReadStream>;
    listFiles(directory: string, pattern: string): Promise<string[]>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => undefined);

    const exists = async (filePath: string): Promise<boolean> => {
        try {
            await fs.promises.stat(filePath);
            return true;
        } catch {
            return false;
        }
    };

    const isDirectory = async (filePath: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(filePath);
            return stats.isDirectory();
        } catch {
            return false;
        }
    };

    const isFile = async (filePath: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(filePath);
            return stats.isFile();
        } catch {
            return false;
        }
    };

    const createDirectory = async (dirPath: string): Promise<void> => {
        await fs.promises.mkdir(dirPath, { recursive: true });
    };

    const readFile = async (filePath: string, encoding: BufferEncoding): Promise<string> => {
        return fs.promises.readFile(filePath, { encoding });
    };

    const writeFile = async (filePath: string, data: string | Buffer, encoding?: BufferEncoding): Promise<void> => {
        await fs.promises.writeFile(filePath, data, encoding ? { encoding } : undefined);
    };

    const writeFileAtomic = async (filePath: string, data: string | Buffer, encoding?: BufferEncoding): Promise<void> => {
        const dir = path.dirname(filePath);
        const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomBytes(4).toString('hex')}.tmp`);
        await createDirectory(dir);
        try {
            await writeFile(tempPath, data, encoding);
            await fs.promises.rename(tempPath, filePath);
            log('Wrote %s', filePath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            throw error;
        }
    };

    const deleteFile = async (filePath: string): Promise<void> => {
        await fs.promises.rm(filePath, { force: true });
    };

    const readStream = async (filePath: string): Promise<fs.ReadStream> => {
        return fs.createReadStream(filePath);
    };

    const listFiles = async (directory: string, pattern: string): Promise<string[]> => {
        if (!await isDirectory(directory)) {
            return [];
        }
        const files = await glob(pattern, { cwd: directory, nodir: true, dot: false });
        return files.sort();
    };

    return {
        exists,
        isDirectory,
        isFile,
        createDirectory,
        readFile,
        writeFile,
        writeFileAtomic,
        deleteFile,
        readStream,
        listFiles,
    };
};
