import type { PrefixMatch } from '../../shared/types/remove-prefix';
import { DEFAULT_BOUNDARY_CHARS } from '../config';

/** 去除首尾空白后前缀的最小字节数 */
export const MIN_PREFIX_LENGTH = 3;

/** 多数前缀需要覆盖的文件百分比，用整数运算避免 0.7 * n 的浮点误差 */
export const MAJORITY_PERCENT = 70;

export interface PrefixDetectorOptions {
  /** 视为分隔符的字符，每项为一个码点 */
  boundaryChars?: readonly string[];
}

function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

function encodeBoundaries(chars: readonly string[]): Buffer[] {
  return chars.filter((char) => char.length > 0).map((char) => Buffer.from(char, 'utf8'));
}

function startsWithBytes(name: Buffer, prefix: Buffer): boolean {
  return name.length >= prefix.length && name.subarray(0, prefix.length).equals(prefix);
}

function countMatches(names: Buffer[], prefix: Buffer): number {
  let count = 0;
  for (const name of names) {
    if (startsWithBytes(name, prefix)) count++;
  }
  return count;
}

/**
 * 截断位置不能落在多字节字符中间，否则回退到该字符的起始字节
 */
function alignToCharBoundary(bytes: Buffer, length: number): number {
  let end = length;
  while (end > 0 && end < bytes.length && isContinuationByte(bytes[end])) {
    end--;
  }
  return end;
}

/**
 * 智能截断：从后向前找到最后一个分隔符，截断到分隔符之后
 *
 * 没有分隔符，或者截断会得到空串 / 原样不变时，返回原始候选
 */
function trimToBoundary(prefix: Buffer, boundaries: Buffer[]): Buffer {
  let cut = -1;

  for (let i = prefix.length - 1; i >= 0 && cut < 0; i--) {
    for (const separator of boundaries) {
      const start = i - separator.length + 1;
      if (start >= 0 && prefix.subarray(start, i + 1).equals(separator)) {
        cut = i + 1;
        break;
      }
    }
  }

  if (cut > 0 && cut < prefix.length) {
    return prefix.subarray(0, cut);
  }

  return prefix;
}

/**
 * 前缀去除首尾空白后至少 3 个字节才有意义
 */
export function isUsablePrefix(prefix: string): boolean {
  return Buffer.byteLength(prefix.trim(), 'utf8') >= MIN_PREFIX_LENGTH;
}

export function majorityThreshold(total: number): number {
  return Math.max(2, Math.floor((total * MAJORITY_PERCENT) / 100));
}

/**
 * 查找所有文件名的最长公共前缀（按字节比较），并截断到分隔符
 */
export function commonPrefix(filenames: readonly string[], options: PrefixDetectorOptions = {}): string {
  if (filenames.length < 2) {
    return '';
  }

  const boundaries = encodeBoundaries(options.boundaryChars ?? DEFAULT_BOUNDARY_CHARS);
  const names = filenames.map((name) => Buffer.from(name, 'utf8'));
  const first = names[0];
  const minLen = Math.min(...names.map((name) => name.length));

  let prefixLen = 0;
  while (prefixLen < minLen && names.every((name) => name[prefixLen] === first[prefixLen])) {
    prefixLen++;
  }

  prefixLen = alignToCharBoundary(first, prefixLen);
  if (prefixLen === 0) {
    return '';
  }

  return trimToBoundary(first.subarray(0, prefixLen), boundaries).toString('utf8');
}

/**
 * 查找被大多数文件共享的前缀，容忍少量离群文件（比如合作曲目）
 *
 * 阈值为 max(2, floor(0.7 * n))。候选来自每个文件名从全长到 3 字节的所有前缀，
 * 复杂度 O(n² · L)，目录内文件数通常只有几十到几百个。
 * 得分相同时保留最先遇到的候选，结果依赖输入顺序。
 */
export function majorityPrefix(filenames: readonly string[], options: PrefixDetectorOptions = {}): string {
  if (filenames.length < 2) {
    return '';
  }

  const boundaries = encodeBoundaries(options.boundaryChars ?? DEFAULT_BOUNDARY_CHARS);
  const names = filenames.map((name) => Buffer.from(name, 'utf8'));
  const threshold = majorityThreshold(names.length);

  let best: Buffer | null = null;
  let bestCount = 0;

  for (const source of names) {
    for (let length = source.length; length >= MIN_PREFIX_LENGTH; length--) {
      if (length < source.length && isContinuationByte(source[length])) {
        continue;
      }

      const candidate = source.subarray(0, length);
      if (countMatches(names, candidate) < threshold) {
        continue;
      }

      const trimmed = trimToBoundary(candidate, boundaries);
      if (!isUsablePrefix(trimmed.toString('utf8'))) {
        continue;
      }

      const score = countMatches(names, trimmed);
      if (score > bestCount) {
        best = trimmed;
        bestCount = score;
      }
    }
  }

  return best ? best.toString('utf8') : '';
}

/**
 * 先找公共前缀，不可用时退回多数前缀
 */
export function detectPrefix(filenames: readonly string[], options: PrefixDetectorOptions = {}): PrefixMatch | null {
  const total = filenames.length;

  const common = commonPrefix(filenames, options);
  if (isUsablePrefix(common)) {
    return { prefix: common, strategy: 'common', matched: total, total };
  }

  const majority = majorityPrefix(filenames, options);
  if (majority) {
    const matched = filenames.filter((name) => name.startsWith(majority)).length;
    return { prefix: majority, strategy: 'majority', matched, total };
  }

  return null;
}
