import type { PostmatterConfig } from '../config.js';

const DELIMITERS = ['+++', '---'];

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): Partial<PostmatterConfig> {
  if (typeof config !== 'object' || config === null) {
    throw new Error('Config must be an object');
  }

  const cfg = config as Record<string, unknown>;

  // バージョンのチェック
  if (cfg.version !== undefined && typeof cfg.version !== 'string') {
    throw new Error('config.version must be a string');
  }

  if (cfg.project !== undefined) {
    validateProjectConfig(cfg.project);
  }

  if (cfg.files !== undefined) {
    validateFilesConfig(cfg.files);
  }

  if (cfg.parser !== undefined) {
    validateParserConfig(cfg.parser);
  }

  if (cfg.loader !== undefined) {
    validateLoaderConfig(cfg.loader);
  }

  return cfg as Partial<PostmatterConfig>;
}

function validateProjectConfig(project: unknown): void {
  if (typeof project !== 'object' || project === null) {
    throw new Error('config.project must be an object');
  }

  const prj = project as Record<string, unknown>;

  if (prj.name !== undefined && typeof prj.name !== 'string') {
    throw new Error('config.project.name must be a string');
  }

  if (prj.root !== undefined && typeof prj.root !== 'string') {
    throw new Error('config.project.root must be a string');
  }
}

function validateStringArray(value: unknown, name: string): asserts value is string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${name} must be an array`);
  }

  if (!value.every((item) => typeof item === 'string')) {
    throw new Error(`${name} must be an array of strings`);
  }
}

function validateFilesConfig(files: unknown): void {
  if (typeof files !== 'object' || files === null) {
    throw new Error('config.files must be an object');
  }

  const f = files as Record<string, unknown>;

  if (f.include !== undefined) {
    validateStringArray(f.include, 'config.files.include');
  }

  if (f.exclude !== undefined) {
    validateStringArray(f.exclude, 'config.files.exclude');
  }

  if (f.ignoreGitignore !== undefined && typeof f.ignoreGitignore !== 'boolean') {
    throw new Error('config.files.ignoreGitignore must be a boolean');
  }
}

function validateParserConfig(parser: unknown): void {
  if (typeof parser !== 'object' || parser === null) {
    throw new Error('config.parser must be an object');
  }

  const p = parser as Record<string, unknown>;

  if (p.delimiters !== undefined) {
    validateStringArray(p.delimiters, 'config.parser.delimiters');
    const delimiters = p.delimiters;
    if (delimiters.length === 0) {
      throw new Error('config.parser.delimiters must not be empty');
    }
    const unknown = delimiters.find((d) => !DELIMITERS.includes(d));
    if (unknown !== undefined) {
      throw new Error(`config.parser.delimiters contains unsupported delimiter "${unknown}"`);
    }
  }

  if (p.unknownKeys !== undefined && p.unknownKeys !== 'ignore' && p.unknownKeys !== 'preserve') {
    throw new Error('config.parser.unknownKeys must be "ignore" or "preserve"');
  }

  if (
    p.missingMetadata !== undefined &&
    p.missingMetadata !== 'error' &&
    p.missingMetadata !== 'empty'
  ) {
    throw new Error('config.parser.missingMetadata must be "error" or "empty"');
  }
}

function validateLoaderConfig(loader: unknown): void {
  if (typeof loader !== 'object' || loader === null) {
    throw new Error('config.loader must be an object');
  }

  const ldr = loader as Record<string, unknown>;

  const concurrency = ldr.concurrency;
  if (concurrency === undefined) {
    return;
  }

  if (typeof concurrency !== 'number') {
    throw new Error('config.loader.concurrency must be a number');
  }

  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new Error('config.loader.concurrency must be a positive integer');
  }
}
