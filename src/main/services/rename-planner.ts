import * as path from 'node:path';
import type { RenamePlan, RenamePlanEntry } from '../../shared/types/remove-prefix';

/**
 * 生成去除前缀的重命名计划
 *
 * 不以前缀开头的文件、去除后与原名相同的文件不进入计划；
 * 去除后为空的文件记入 emptyNames，由调用方输出警告。
 * 新文件名之间的冲突不在这里处理，见 findCollisions。
 */
export function planRenames(directory: string, files: readonly string[], prefix: string): RenamePlan {
  const entries: RenamePlanEntry[] = [];
  const emptyNames: string[] = [];

  for (const file of files) {
    const oldName = path.basename(file);
    if (!prefix || !oldName.startsWith(prefix)) {
      continue;
    }

    const newName = oldName.slice(prefix.length).trim();

    if (newName === '') {
      emptyNames.push(oldName);
      continue;
    }

    if (newName !== oldName) {
      entries.push({
        oldPath: file,
        newPath: path.join(directory, newName),
        oldName,
        newName,
      });
    }
  }

  return { entries, emptyNames };
}

/**
 * 返回被多个条目共用的新文件名
 */
export function findCollisions(entries: readonly RenamePlanEntry[]): string[] {
  const seen = new Set<string>();
  const collisions = new Set<string>();

  for (const entry of entries) {
    if (seen.has(entry.newName)) {
      collisions.add(entry.newName);
    }
    seen.add(entry.newName);
  }

  return [...collisions];
}
