import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DirectoryFileFetcher, globToRegExp, removeDir, writeAssetFiles } from '../fileStore.js';
import { assetFile } from '../assetFile.js';

describe('globToRegExp', () => {
  it('should match star and question mark within one segment', () => {
    expect(globToRegExp('*').test('cluster-config.yaml')).toBe(true);
    expect(globToRegExp('*.yaml').test('a.yml')).toBe(false);
    expect(globToRegExp('etcd-?.yaml').test('etcd-0.yaml')).toBe(true);
    expect(globToRegExp('a.b').test('aXb')).toBe(false);
  });
});

describe('DirectoryFileFetcher', () => {
  let tempDir: string;
  let fetcher: DirectoryFileFetcher;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'asset-store-test-'));
    fetcher = new DirectoryFileFetcher(tempDir);
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it('should return null for a missing file', async () => {
    expect(await fetcher.fetchByName('manifests/cluster-config.yaml')).toBeNull();
  });

  it('should read a file by name', async () => {
    await fs.mkdir(path.join(tempDir, 'tls'));
    await fs.writeFile(path.join(tempDir, 'tls', 'root-ca.crt'), 'cert');

    const file = await fetcher.fetchByName('tls/root-ca.crt');
    expect(file?.path).toBe('tls/root-ca.crt');
    expect(file?.content.toString('utf-8')).toBe('cert');
  });

  it('should return an empty list when the directory does not exist', async () => {
    expect(await fetcher.fetchByPattern('manifests/*')).toEqual([]);
  });

  it('should list matching files of one directory, sorted, without recursing', async () => {
    await fs.mkdir(path.join(tempDir, 'manifests', 'nested'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'manifests', 'pull.json'), '{}');
    await fs.writeFile(path.join(tempDir, 'manifests', 'cvo-overrides.yaml'), 'a');
    await fs.writeFile(path.join(tempDir, 'manifests', 'nested', 'deep.yaml'), 'b');
    await fs.writeFile(path.join(tempDir, 'unrelated.yaml'), 'c');

    const files = await fetcher.fetchByPattern('manifests/*');
    expect(files.map((f) => f.path)).toEqual(['manifests/cvo-overrides.yaml', 'manifests/pull.json']);

    const yamlOnly = await fetcher.fetchByPattern('manifests/*.yaml');
    expect(yamlOnly.map((f) => f.path)).toEqual(['manifests/cvo-overrides.yaml']);
  });
});

describe('writeAssetFiles', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'asset-store-test-'));
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it('should write files and leave no temp files behind', async () => {
    await writeAssetFiles(tempDir, [
      assetFile('manifests/a.yaml', 'a: 1\n'),
      assetFile('manifests/b.yaml', 'b: 2\n'),
    ]);

    expect(await fs.readFile(path.join(tempDir, 'manifests', 'a.yaml'), 'utf-8')).toBe('a: 1\n');
    expect((await fs.readdir(path.join(tempDir, 'manifests'))).sort()).toEqual(['a.yaml', 'b.yaml']);
  });

  it('should overwrite an existing file', async () => {
    await writeAssetFiles(tempDir, [assetFile('x.txt', 'old')]);
    await writeAssetFiles(tempDir, [assetFile('x.txt', 'new')]);

    expect(await fs.readFile(path.join(tempDir, 'x.txt'), 'utf-8')).toBe('new');
  });

  it('should round-trip through the fetcher', async () => {
    const original = [assetFile('manifests/one.yaml', 'one'), assetFile('manifests/two.yaml', 'two')];
    await writeAssetFiles(tempDir, original);

    const fetched = await new DirectoryFileFetcher(tempDir).fetchByPattern('manifests/*');
    expect(fetched).toEqual(original);
  });
});
