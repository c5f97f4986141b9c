import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { PostmatterConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

export interface ResolvedConfig {
  config: PostmatterConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .postmatter.json > postmatter.json
 */
export const CONFIG_FILE_NAMES = ['.postmatter.json', 'postmatter.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（ファイルがなければデフォルト設定）
   */
  static async load(configPath: string = './.postmatter.json'): Promise<PostmatterConfig> {
    try {
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      return this.mergeWithDefaults(config);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: postmatter config init'
      );
    }

    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();

    // project.rootは設定ファイルのディレクトリからの相対パス
    const baseDir = configPath ? path.dirname(configPath) : cwd;
    const projectRoot = await this.normalizeProjectRoot(path.resolve(baseDir, config.project.root));

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   * 呼び出し側での変更がDEFAULT_CONFIGに波及しないようにコピーを返す
   */
  static getDefaultConfig(): PostmatterConfig {
    return structuredClone(DEFAULT_CONFIG);
  }

  /**
   * 設定ファイルを探索
   */
  private static async findConfigFile(startDir: string, traverseUp: boolean): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 1. 明示的に指定されたパス
   * 2. 環境変数 POSTMATTER_CONFIG
   * 3. 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.POSTMATTER_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return absolutePath.replace(/\/$/, '');
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: Partial<PostmatterConfig>): PostmatterConfig {
    const defaults = this.getDefaultConfig();
    return {
      version: config.version ?? defaults.version,
      project: {
        name: config.project?.name ?? defaults.project.name,
        root: config.project?.root ?? defaults.project.root,
      },
      files: {
        include: config.files?.include ?? defaults.files.include,
        exclude: config.files?.exclude ?? defaults.files.exclude,
        ignoreGitignore: config.files?.ignoreGitignore ?? defaults.files.ignoreGitignore,
      },
      parser: {
        delimiters: config.parser?.delimiters ?? defaults.parser.delimiters,
        unknownKeys: config.parser?.unknownKeys ?? defaults.parser.unknownKeys,
        missingMetadata: config.parser?.missingMetadata ?? defaults.parser.missingMetadata,
      },
      loader: {
        concurrency: config.loader?.concurrency ?? defaults.loader.concurrency,
      },
    };
  }
}
