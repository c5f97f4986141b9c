import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CollectionLoader, normalizeDocumentPath } from '../collection-loader.js';

const FILES = { include: ['**/*.md'], exclude: [], ignoreGitignore: false };

describe('CollectionLoader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `postmatter-loader-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(join(testDir, 'posts'), { recursive: true });

    await fs.writeFile(
      join(testDir, 'posts', 'ownership.md'),
      "+++\ntitle = 'Ownership'\ndate = '2021-03-01'\ntags = ['memory']\n+++\nEvery value has an owner.\n"
    );
    await fs.writeFile(
      join(testDir, 'posts', 'broken.md'),
      "+++\ntitle = 'Broken'\nNo closing delimiter.\n"
    );
    await fs.writeFile(join(testDir, 'posts', 'plain.md'), 'No front matter here.\n');
    await fs.writeFile(
      join(testDir, 'posts', 'extra.md'),
      "+++\ntitle = 'Extra'\nseries = 'memory'\n+++\n"
    );
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('loadFile', () => {
    it('1文書を読み込める', async () => {
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES });

      const result = await loader.loadFile('posts/ownership.md');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.document.metadata).toEqual({
          title: 'Ownership',
          date: '2021-03-01',
          tags: ['memory'],
        });
        expect(result.document.body).toBe('Every value has an owner.\n');
      }
    });

    it('存在しないファイルはReadError', async () => {
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES });

      const result = await loader.loadFile('posts/missing.md');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('ReadError');
        expect(result.error.message).toBe('cannot read file (ENOENT)');
      }
    });

    it('Windows形式のパスを正規化する', async () => {
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES });

      const result = await loader.loadFile('posts\\ownership.md');

      expect(result.path).toBe('posts/ownership.md');
      expect(result.ok).toBe(true);
    });
  });

  describe('loadAll', () => {
    it('失敗した文書があっても他の文書を読み込む', async () => {
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES });

      const report = await loader.loadAll();

      expect(report.results.map((r) => [r.path, r.ok])).toEqual([
        ['posts/broken.md', false],
        ['posts/extra.md', true],
        ['posts/ownership.md', true],
        ['posts/plain.md', false],
      ]);
      expect(report.collection.paths()).toEqual(['posts/extra.md', 'posts/ownership.md']);
      expect(report.failures.map((f) => [f.path, f.error.kind])).toEqual([
        ['posts/broken.md', 'MalformedDocument'],
        ['posts/plain.md', 'MissingMetadata'],
      ]);
    });

    it('未知のキーは警告として結果に含める', async () => {
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES });

      const report = await loader.loadAll();

      const extra = report.results.find((r) => r.path === 'posts/extra.md');
      expect(extra?.ok).toBe(true);
      if (extra?.ok) {
        expect(extra.warnings.map((w) => [w.kind, w.key])).toEqual([['UnrecognizedKey', 'series']]);
      }
    });

    it('パーサ設定を適用できる', async () => {
      const loader = new CollectionLoader({
        rootDir: testDir,
        files: FILES,
        parser: { missingMetadata: 'empty', unknownKeys: 'preserve' },
      });

      const report = await loader.loadAll();

      expect(report.failures.map((f) => f.path)).toEqual(['posts/broken.md']);
      expect(report.collection.get('posts/plain.md')?.body).toBe('No front matter here.\n');
      expect(report.collection.get('posts/extra.md')?.extra).toEqual({ series: 'memory' });
    });

    it('指定したパスのみ読み込める', async () => {
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES, concurrency: 1 });

      const report = await loader.loadAll(['posts/ownership.md', 'posts/extra.md']);

      expect(report.collection.paths()).toEqual(['posts/extra.md', 'posts/ownership.md']);
      expect(report.failures).toEqual([]);
    });

    it('正規化して同じになるパスはDuplicatePath', async () => {
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES });

      const report = await loader.loadAll(['posts/ownership.md', './posts/ownership.md']);

      expect(report.collection.size).toBe(1);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0].error.kind).toBe('DuplicatePath');
    });

    it('YAMLの読み込みで例外になる文書があっても他の文書を読み込む', async () => {
      await fs.writeFile(join(testDir, 'posts', 'alias.md'), '---\ntitle: *missing\n---\nbody\n');
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES });

      const report = await loader.loadAll(['posts/alias.md', 'posts/ownership.md']);

      expect(report.collection.paths()).toEqual(['posts/ownership.md']);
      expect(report.failures.map((f) => [f.path, f.error.kind])).toEqual([
        ['posts/alias.md', 'MalformedDocument'],
      ]);
    });

    it('同時に読み込む文書数はconcurrencyを超えない', async () => {
      const paths: string[] = [];
      for (let i = 0; i < 6; i++) {
        const file = `posts/n${i}.md`;
        await fs.writeFile(join(testDir, file), `+++\ntitle = 'N${i}'\n+++\n`);
        paths.push(file);
      }
      const loader = new CollectionLoader({ rootDir: testDir, files: FILES, concurrency: 2 });

      const loadFile = loader.loadFile.bind(loader);
      let inFlight = 0;
      let maxInFlight = 0;
      vi.spyOn(loader, 'loadFile').mockImplementation(async (filePath: string) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        try {
          await new Promise((resolve) => setTimeout(resolve, 5));
          return await loadFile(filePath);
        } finally {
          inFlight--;
        }
      });

      const report = await loader.loadAll(paths);

      expect(maxInFlight).toBe(2);
      expect(report.collection.size).toBe(6);
      expect(report.failures).toEqual([]);
    });

    it('文書がなければ空のコレクション', async () => {
      const empty = join(testDir, 'empty');
      await fs.mkdir(empty);
      const loader = new CollectionLoader({ rootDir: empty, files: FILES });

      const report = await loader.loadAll();

      expect(report.collection.size).toBe(0);
      expect(report.results).toEqual([]);
    });
  });
});

describe('normalizeDocumentPath', () => {
  it('区切り文字と冗長なセグメントを正規化する', () => {
    expect(normalizeDocumentPath('posts\\a.md')).toBe('posts/a.md');
    expect(normalizeDocumentPath('./posts//a.md')).toBe('posts/a.md');
  });
});
