import { ExitPromptError } from '@inquirer/core';
import { input } from '@inquirer/prompts';

/**
 * 从终端读取一行用户输入
 *
 * 不显示 inquirer 默认的 "?" 前缀，提问按原文输出
 */
export async function askForInput(prompt: string): Promise<string> {
  return input({ message: prompt.trimEnd(), theme: { prefix: '' } });
}

/**
 * 用户按下 Ctrl+C 或输入流被关闭时，inquirer 以 ExitPromptError 拒绝
 *
 * 按名称判断，兼容 inquirer 的 CommonJS 和 ESM 两份构建
 */
export function isPromptExit(error: unknown): boolean {
  return error instanceof ExitPromptError || (error instanceof Error && error.name === 'ExitPromptError');
}
