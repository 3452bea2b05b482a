import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { artifactPaths } from '../config';
import { fakeConverter, fakeTextService, makeConfig, makeTempDir, writeFiles } from '../test/helpers';
import type { PipelineConfig, StagedItem } from '../types';
import { pathExists } from '../utils/fs';
import { cleanItem, processItem, runConversions } from './orchestrator';
import { validateSummary } from './summarizer';

const GOOD_SUMMARY = '**2025-09-10,BigBank: Title**\n- point one';

async function stageFixtures(config: PipelineConfig, files: Record<string, string>) {
  await writeFiles(config.paths.storeDir, files);
  return Object.keys(files).map<StagedItem>(fileName => ({
    itemId: path.basename(fileName, path.extname(fileName)),
    fileName,
    path: path.join(config.paths.storeDir, fileName),
    originalName: fileName
  }));
}

describe('orchestrator', () => {
  let config: PipelineConfig;

  beforeEach(async () => {
    config = makeConfig(await makeTempDir());
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes text, cleaned and summary artifacts for an item', async () => {
    const [item] = await stageFixtures(config, {
      'abc.md': 'Body line\nImportant Disclosures\nBoilerplate'
    });
    const { converter } = fakeConverter();
    const { service, complete } = fakeTextService(() => GOOD_SUMMARY);

    const outcome = await processItem(item, config, { convert: converter, text: service });

    const paths = artifactPaths(config.paths, 'abc');
    expect(outcome).toEqual({
      ok: true,
      itemId: 'abc',
      fileName: 'abc.md',
      summaryPath: paths.summary
    });
    await expect(fs.readFile(paths.cleaned, 'utf-8')).resolves.toBe(
      'Body line\nImportant Disclosures'
    );
    await expect(fs.readFile(paths.summary, 'utf-8')).resolves.toBe(GOOD_SUMMARY);
    expect(complete).toHaveBeenCalledWith(
      config.summaryPrompt,
      'Body line\nImportant Disclosures',
      expect.any(AbortSignal)
    );
  });

  it('makes no external calls when run again over finished artifacts', async () => {
    const items = await stageFixtures(config, { 'a.md': 'alpha text', 'b.md': 'beta text' });
    const first = fakeConverter();
    const firstText = fakeTextService(() => GOOD_SUMMARY);
    await runConversions(items, config, { convert: first.converter, text: firstText.service });
    const before = await fs.readFile(artifactPaths(config.paths, 'a').summary, 'utf-8');

    const second = fakeConverter();
    const secondText = fakeTextService(() => 'a different summary entirely');
    const batch = await runConversions(items, config, {
      convert: second.converter,
      text: secondText.service
    });

    expect(second.convert).not.toHaveBeenCalled();
    expect(secondText.complete).not.toHaveBeenCalled();
    expect(batch.succeeded.map(ref => ref.itemId).sort()).toEqual(['a', 'b']);
    await expect(fs.readFile(artifactPaths(config.paths, 'a').summary, 'utf-8')).resolves.toBe(
      before
    );
  });

  it('drops only the item whose summary fails', async () => {
    const items = await stageFixtures(config, {
      'a.md': 'text for A',
      'b.md': 'text for B',
      'c.md': 'text for C'
    });
    const { converter } = fakeConverter();
    const { service } = fakeTextService((_, content) => {
      if (content.includes('A')) throw new Error('gateway error');
      return GOOD_SUMMARY;
    });

    const batch = await runConversions(items, config, { convert: converter, text: service });

    expect(batch.succeeded.map(ref => ref.itemId).sort()).toEqual(['b', 'c']);
    expect(batch.failed).toEqual([
      { ok: false, itemId: 'a', stage: 'summarize', reason: 'gateway error' }
    ]);
    await expect(pathExists(artifactPaths(config.paths, 'a').summary)).resolves.toBe(false);
  });

  it('fails an item whose conversion throws', async () => {
    const [item] = await stageFixtures(config, { 'bad.pdf': '%PDF' });
    const { converter } = fakeConverter(() => {
      throw new Error('corrupt pdf');
    });
    const { service, complete } = fakeTextService(() => GOOD_SUMMARY);

    const outcome = await processItem(item, config, { convert: converter, text: service });

    expect(outcome).toEqual({ ok: false, itemId: 'bad', stage: 'convert', reason: 'corrupt pdf' });
    expect(complete).not.toHaveBeenCalled();
    await expect(pathExists(artifactPaths(config.paths, 'bad').text)).resolves.toBe(false);
  });

  it('fails an item whose cleaned text is blank', async () => {
    const [item] = await stageFixtures(config, { 'empty.md': '  \n\n' });
    const { converter } = fakeConverter();
    const { service, complete } = fakeTextService(() => GOOD_SUMMARY);

    const outcome = await processItem(item, config, { convert: converter, text: service });

    expect(outcome).toEqual({
      ok: false,
      itemId: 'empty',
      stage: 'summarize',
      reason: '清理后内容为空'
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it('rejects a summary below the minimum length', async () => {
    const [item] = await stageFixtures(config, { 'short.md': 'some text' });
    const { converter } = fakeConverter();
    const { service } = fakeTextService(() => '  tiny  ');

    const outcome = await processItem(item, config, { convert: converter, text: service });

    expect(outcome.ok).toBe(false);
    await expect(pathExists(artifactPaths(config.paths, 'short').summary)).resolves.toBe(false);
  });

  it('treats a hung call as a failure', async () => {
    const [item] = await stageFixtures(config, { 'slow.md': 'text' });
    const { converter } = fakeConverter(() => new Promise<string>(() => undefined));
    const { service } = fakeTextService(() => GOOD_SUMMARY);

    const outcome = await processItem(
      item,
      { ...config, callTimeoutMs: 20 },
      { convert: converter, text: service }
    );

    expect(outcome).toEqual({
      ok: false,
      itemId: 'slow',
      stage: 'convert',
      reason: '转换 slow.md 超时（20ms）'
    });
  });

  it('collects results in completion order, not submission order', async () => {
    const items = await stageFixtures(config, { 'first.md': 'one', 'second.md': 'two' });
    const { converter } = fakeConverter(async filePath => {
      if (filePath.endsWith('first.md')) {
        await new Promise(resolve => setTimeout(resolve, 30));
      }
      return 'content';
    });
    const { service } = fakeTextService(() => GOOD_SUMMARY);

    const batch = await runConversions(items, config, { convert: converter, text: service });

    expect(batch.succeeded.map(ref => ref.itemId)).toEqual(['second', 'first']);
  });

  it('honours custom boundary predicates when cleaning', async () => {
    await writeFiles(config.paths.textDir, { 'x.md': 'keep\nSTOP\ndrop' });

    const cleaned = await cleanItem('x', config, [line => line === 'STOP']);

    await expect(fs.readFile(cleaned, 'utf-8')).resolves.toBe('keep\nSTOP');
  });

  it('validates summary length', () => {
    expect(() => validateSummary(undefined, 10)).toThrow('摘要为空或过短');
    expect(() => validateSummary('123456789', 10)).toThrow('摘要为空或过短');
    expect(validateSummary('1234567890', 10)).toBe('1234567890');
  });
});
