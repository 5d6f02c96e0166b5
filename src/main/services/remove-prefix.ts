import * as fs from 'node:fs';
import * as path from 'node:path';
import type {
  PrefixMatch,
  RemovePrefixOptions as BaseRemovePrefixOptions,
  RemovePrefixSummary,
  RenamePlanEntry,
} from '../../shared/types/remove-prefix';
import log from '../utils/logger';
import { isPromptExit } from '../utils/prompt';
import { collectFiles, groupFilesByDirectory } from './directory-walker';
import { detectPrefix } from './prefix-detector';
import { findCollisions, planRenames } from './rename-planner';

export interface RemovePrefixOptions extends BaseRemovePrefixOptions {
  boundaryChars?: readonly string[];
  previewCount?: number;
  onProgress?: (message: string) => void;
  onError?: (message: string) => void;
  onInputRequired?: (prompt: string) => Promise<string>;
}

interface GroupResult {
  renamed: number;
  failed: number;
  declined: boolean;
}

const NOTHING_DONE: GroupResult = { renamed: 0, failed: 0, declined: false };

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

function describePrefix(match: PrefixMatch): string {
  const length = Buffer.byteLength(match.prefix, 'utf8');
  if (match.strategy === 'majority') {
    return `Majority prefix found: ${match.prefix} (length: ${length} bytes, shared by ${match.matched}/${match.total} files)`;
  }
  return `Common prefix found: ${match.prefix} (length: ${length} bytes)`;
}

/**
 * 校验根目录，返回绝对路径
 */
function resolveRoot(directory: string): string {
  const absDir = path.resolve(directory);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(absDir);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new Error(`unable to access directory ${absDir}: ${errorMessage}`);
  }

  if (!stat.isDirectory()) {
    throw new Error(`${absDir} is not a directory`);
  }

  return absDir;
}

/**
 * 逐个执行重命名，单个失败不影响其余文件
 */
function executeRenames(plans: RenamePlanEntry[], onError?: (message: string) => void): number {
  let successCount = 0;

  for (const plan of plans) {
    try {
      // 目标已存在时不覆盖
      if (fs.existsSync(plan.newPath)) {
        throw new Error('target already exists');
      }
      fs.renameSync(plan.oldPath, plan.newPath);
      successCount++;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      onError?.(`Error: failed to rename ${plan.oldName}: ${errorMessage}`);
    }
  }

  return successCount;
}

/**
 * 处理单个目录
 */
async function processDirectory(dir: string, files: string[], options: RemovePrefixOptions): Promise<GroupResult> {
  const { dryRun = false, autoConfirm = false, previewCount = 5, onProgress, onError, onInputRequired } = options;

  // 少于 2 个文件无需处理
  if (files.length < 2) {
    log.debug(`${dir}: only ${files.length} file(s), skipped`);
    return NOTHING_DONE;
  }

  const filenames = files.map((file) => path.basename(file));

  const match = detectPrefix(filenames, { boundaryChars: options.boundaryChars });
  if (!match) {
    log.debug(`${dir}: no usable prefix`);
    return NOTHING_DONE;
  }

  onProgress?.('');
  onProgress?.(`Directory: ${dir}`);
  onProgress?.(describePrefix(match));
  onProgress?.(`File count: ${files.length}`);
  onProgress?.(`Example filename: ${filenames[0]}`);
  onProgress?.('');

  const { entries: plans, emptyNames } = planRenames(dir, files, match.prefix);

  for (const name of emptyNames) {
    onProgress?.(`Warning: filename empty after removing prefix, skipping: ${name}`);
  }

  if (plans.length === 0) {
    return NOTHING_DONE;
  }

  for (const name of findCollisions(plans)) {
    onProgress?.(`Warning: more than one file would be renamed to ${name}`);
  }

  onProgress?.(`Rename preview (showing first ${previewCount}):`);
  const displayCount = Math.min(previewCount, plans.length);
  for (const plan of plans.slice(0, displayCount)) {
    onProgress?.(`  ${plan.oldName}`);
    onProgress?.(`  -> ${plan.newName}`);
    onProgress?.('');
  }
  if (plans.length > displayCount) {
    onProgress?.(`  ... and ${plans.length - displayCount} more files`);
    onProgress?.('');
  }

  if (dryRun) {
    onProgress?.('[Preview Mode] No actual renaming performed');
    return NOTHING_DONE;
  }

  let proceed = autoConfirm;
  if (!autoConfirm) {
    if (!onInputRequired) {
      throw new Error('confirmation required but no input is available');
    }
    const answer = await onInputRequired(`Proceed to rename these ${plans.length} files? (y/n): `);
    proceed = isAffirmative(answer);
  }

  if (!proceed) {
    onProgress?.('Skipped this directory');
    return { renamed: 0, failed: 0, declined: true };
  }

  const successCount = executeRenames(plans, onError);
  onProgress?.(`Successfully renamed ${successCount}/${plans.length} files`);

  return { renamed: successCount, failed: plans.length - successCount, declined: false };
}

/**
 * 递归遍历目录，去除每个目录内文件名的公共前缀
 */
export async function removePrefix(options: RemovePrefixOptions): Promise<RemovePrefixSummary> {
  const { directory, dryRun = false, excludeDirs = [], extensions = [], onProgress, onError } = options;

  if (!directory) {
    throw new Error('no directory specified');
  }

  const absDir = resolveRoot(directory);

  onProgress?.(`Processing directory: ${absDir}`);
  if (dryRun) {
    onProgress?.('Mode: Preview mode (files will not be modified)');
  }
  onProgress?.('');

  let files: string[];
  try {
    files = collectFiles(absDir, { excludeDirs, extensions });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new Error(`failed to collect files: ${errorMessage}`);
  }

  const summary: RemovePrefixSummary = { totalFiles: files.length, directories: 0, renamed: 0, failed: 0, declined: 0 };

  if (files.length === 0) {
    onProgress?.('No files found');
    return summary;
  }

  onProgress?.(`Found ${files.length} files in total`);

  const groups = groupFilesByDirectory(files);
  summary.directories = groups.size;
  onProgress?.(`Involving ${groups.size} directories`);

  for (const [dir, dirFiles] of groups) {
    try {
      const result = await processDirectory(dir, dirFiles, options);
      summary.renamed += result.renamed;
      summary.failed += result.failed;
      if (result.declined) summary.declined++;
    } catch (error) {
      // 用户取消输入时中止整个任务，已完成的重命名保留
      if (isPromptExit(error)) {
        throw error;
      }
      const errorMessage = error instanceof Error ? error.message : String(error);
      onError?.(`Error: failed to process directory ${dir}: ${errorMessage}`);
    }
  }

  onProgress?.('');
  onProgress?.('Processing complete!');

  return summary;
}
