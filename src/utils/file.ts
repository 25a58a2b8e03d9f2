import fs from 'fs-extra';
import path from 'path';
import * as glob from 'glob';
import { PersistenceError } from './errors';

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fs.ensureDir(dirPath);
  } catch (error) {
    throw new PersistenceError('Could not create directory', dirPath, error);
  }
}

/**
 * 一時ファイルに書いてから置き換える。途中で失敗しても元のファイルは残る。
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.move(tempPath, filePath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    throw new PersistenceError('Could not write file', filePath, error);
  }
}

export async function appendText(filePath: string, content: string): Promise<void> {
  try {
    await fs.ensureDir(path.dirname(filePath));
    await fs.appendFile(filePath, content, 'utf8');
  } catch (error) {
    throw new PersistenceError('Could not append to file', filePath, error);
  }
}

export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.remove(filePath);
  } catch (error) {
    throw new PersistenceError('Could not remove file', filePath, error);
  }
}

export async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new PersistenceError('Could not read file', filePath, error);
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  return fs.pathExists(filePath);
}

/** ディレクトリ内でパターンに合うファイル名（ソート済み） */
export function listFiles(dirPath: string, pattern: string): string[] {
  return glob.sync(pattern, { cwd: dirPath, nodir: true }).sort();
}
