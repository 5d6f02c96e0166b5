import * as fs from 'node:fs';
import * as path from 'node:path';
import log from '../utils/logger';

export interface CollectFilesOptions {
  /** 按目录名（不是路径）排除，命中的目录整体跳过 */
  excludeDirs?: readonly string[];
  /** 只收集这些扩展名的文件，空表示全部文件 */
  extensions?: readonly string[];
}

/**
 * 统一为小写并补上前导点：'MP3' -> '.mp3'
 */
export function normalizeExtensions(extensions: readonly string[]): string[] {
  return extensions
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext !== '' && ext !== '.')
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

/**
 * 递归收集目录下的所有文件
 *
 * 同一目录内按文件名顺序遍历。读取失败直接抛出，整个任务中止。
 */
export function collectFiles(root: string, options: CollectFilesOptions = {}): string[] {
  const excluded = new Set(options.excludeDirs ?? []);
  const extensions = new Set(normalizeExtensions(options.extensions ?? []));
  const results: string[] = [];

  function scan(currentDir: string): void {
    log.debug(`scanning ${currentDir}`);
    const entries = fs
      .readdirSync(currentDir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);

      if (entry.isDirectory()) {
        if (excluded.has(entry.name)) {
          log.debug(`skipping excluded directory ${fullPath}`);
          continue;
        }
        scan(fullPath);
      } else if (extensions.size === 0 || extensions.has(path.extname(entry.name).toLowerCase())) {
        results.push(fullPath);
      }
    }
  }

  scan(root);
  return results;
}

/**
 * 按所在目录分组，保持遍历顺序
 */
export function groupFilesByDirectory(files: readonly string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();

  for (const file of files) {
    const dir = path.dirname(file);
    const group = groups.get(dir);
    if (group) {
      group.push(file);
    } else {
      groups.set(dir, [file]);
    }
  }

  return groups;
}
