/**
 * 去除文件名公共前缀相关类型定义
 * 在 CLI、服务层和测试之间共享
 */

export type PrefixStrategy = 'common' | 'majority';

/**
 * 一个目录分组检测到的前缀
 */
export interface PrefixMatch {
  prefix: string;
  strategy: PrefixStrategy;
  /** 以该前缀开头的文件数 */
  matched: number;
  total: number;
}

export interface RenamePlanEntry {
  oldPath: string;
  newPath: string;
  oldName: string;
  newName: string;
}

export interface RenamePlan {
  entries: RenamePlanEntry[];
  /** 去除前缀后为空、被跳过的原文件名 */
  emptyNames: string[];
}

export interface RemovePrefixOptions {
  directory: string;
  dryRun?: boolean;
  autoConfirm?: boolean;
  excludeDirs?: string[];
  extensions?: string[];
}

export interface RemovePrefixSummary {
  totalFiles: number;
  directories: number;
  renamed: number;
  failed: number;
  declined: number;
}
