import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { EDITOR_USAGE, runEditor } from '../../src/cli/editor';
import { collectingIo, makeTempDir, removeTempDir } from './helpers';

describe('runEditor', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    file = join(dir, 'doc.md');
    await writeFile(file, '# A\n## B\n');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('edits the file in place', async () => {
    const io = collectingIo();
    const code = await runEditor([file, 'add_numbers', '--style', 'technical'], io);

    expect(code).toBe(0);
    expect(await readFile(file, 'utf8')).toBe('# 1 A\n## 1.1 B\n');
    expect(io.logs).toEqual([`add_numbers: 2 of 2 headings changed -> ${file}`]);
    expect(io.errors).toEqual([]);
  });

  it('writes to --output and leaves the input alone', async () => {
    const output = join(dir, 'out.md');
    const code = await runEditor([file, 'upgrade', '-o', output], collectingIo());

    expect(code).toBe(0);
    expect(await readFile(output, 'utf8')).toBe('# A\n# B\n');
    expect(await readFile(file, 'utf8')).toBe('# A\n## B\n');
  });

  it('reads the style from a config file', async () => {
    const config = join(dir, 'settings.json');
    await writeFile(config, JSON.stringify({ style: 'chinese_bidding' }));
    const code = await runEditor([file, 'add_numbers', '--config', config], collectingIo());

    expect(code).toBe(0);
    expect(await readFile(file, 'utf8')).toBe('# 一、 A\n## (一) B\n');
  });

  it('lets flags override the config file', async () => {
    const config = join(dir, 'settings.json');
    await writeFile(config, JSON.stringify({ style: 'chinese_bidding' }));
    await runEditor([file, 'add_numbers', '--config', config, '--style', 'academic'], collectingIo());

    expect(await readFile(file, 'utf8')).toBe('# 1. A\n## 1.1. B\n');
  });

  it('skips fenced code with --ignore-code-blocks', async () => {
    await writeFile(file, '# A\n```\n# comment\n```\n');
    await runEditor([file, 'add_numbers', '--style', 'technical', '--ignore-code-blocks'], collectingIo());

    expect(await readFile(file, 'utf8')).toBe('# 1 A\n```\n# comment\n```\n');
  });

  it('prints usage with --help', async () => {
    const io = collectingIo();
    expect(await runEditor(['--help'], io)).toBe(0);
    expect(io.logs).toEqual([EDITOR_USAGE]);
  });

  describe('errors', () => {
    it('requires a style for add_numbers and leaves the file untouched', async () => {
      const io = collectingIo();
      expect(await runEditor([file, 'add_numbers'], io)).toBe(1);
      expect(io.errors).toEqual(['Error: The add_numbers action requires a numbering style (--style)']);
      expect(await readFile(file, 'utf8')).toBe('# A\n## B\n');
    });

    it('rejects unknown actions', async () => {
      const io = collectingIo();
      expect(await runEditor([file, 'sideways'], io)).toBe(1);
      expect(io.errors).toEqual([
        "Error: Invalid action 'sideways'. Expected one of: upgrade, downgrade, remove_numbers, add_numbers",
      ]);
    });

    it('rejects unknown styles', async () => {
      const io = collectingIo();
      expect(await runEditor([file, 'add_numbers', '--style', 'roman'], io)).toBe(1);
      expect(io.errors).toEqual([
        "Error: Unknown numbering style 'roman'. Expected one of: chinese_bidding, technical, academic",
      ]);
    });

    it('reports a missing input file', async () => {
      const missing = join(dir, 'missing.md');
      const io = collectingIo();
      expect(await runEditor([missing, 'upgrade'], io)).toBe(1);
      expect(io.errors).toEqual([`Error: File not found: ${missing}`]);
    });

    it('reports missing positional arguments', async () => {
      const io = collectingIo();
      expect(await runEditor([file], io)).toBe(1);
      expect(io.errors).toEqual(['Error: Missing arguments: expected <file> <action>']);
    });

    it('rejects unknown flags', async () => {
      const io = collectingIo();
      expect(await runEditor([file, 'upgrade', '--fast'], io)).toBe(1);
      expect(io.errors).toHaveLength(1);
      expect(io.errors[0].startsWith('Error: ')).toBe(true);
    });
  });
});
