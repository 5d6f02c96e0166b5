export interface RemovePrefixDefaults {
  dir: string;
  excludeDirs: string[];
  extensions: string[];
}

export interface AppConfig {
  binName: string;
  displayName: string;
  description: string;
  version: string;
  defaults: RemovePrefixDefaults;
  /** 前缀智能截断时视为分隔符的字符 */
  boundaryChars: string[];
  /** 预览时显示的条目数 */
  previewCount: number;
}

export const DEFAULT_BOUNDARY_CHARS: readonly string[] = ['-', '_', ' ', ')', ']', '】'];

export function createConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    binName: 'audiotool',
    displayName: 'Audio Tool',
    description: 'Batch audio file processing tool',
    version: '1.0.0',
    boundaryChars: [...DEFAULT_BOUNDARY_CHARS],
    previewCount: 5,
    ...overrides,
    defaults: {
      dir: '.',
      excludeDirs: ['@eaDir'],
      extensions: [],
      ...overrides.defaults,
    },
  };
}
