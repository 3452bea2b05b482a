import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { makeConfig, makeTempDir, writeFiles } from '../test/helpers';
import type { HighlightEntry, PipelineConfig } from '../types';
import {
  assembleHighlights,
  buildReportLink,
  findRecoverableSummaries,
  findStagedItems,
  highlightsPath,
  orderEntries,
  renderHighlights
} from './assembler';

function entry(overrides: Partial<HighlightEntry>): HighlightEntry {
  return {
    itemId: 'id',
    header: '2025-09-10,BigBank: Title',
    date: '2025-09-10',
    source: 'BigBank',
    title: 'Title',
    bullets: [],
    link: 'https://files.example.com/2025-09-12/id.pdf',
    ...overrides
  };
}

describe('assembler', () => {
  let config: PipelineConfig;

  beforeEach(async () => {
    config = makeConfig(await makeTempDir());
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds report links from base, period and stored name', () => {
    expect(buildReportLink('https://files.example.com/', '2025-09-12', 'abc.pdf')).toBe(
      'https://files.example.com/2025-09-12/abc.pdf'
    );
  });

  it('renders the fixed block layout', () => {
    const content = renderHighlights(
      [
        entry({ itemId: 'a', bullets: ['- one', '- two'], link: 'https://x/a.pdf' }),
        entry({ itemId: 'b', header: '2025-09-09,Other', link: 'https://x/b.pdf' })
      ],
      '2025-09-12',
      'Sellside highlights for Week'
    );

    expect(content).toBe(
      [
        '# Sellside highlights for Week – 2025-09-12',
        '',
        '**2025-09-10,BigBank: Title**',
        '',
        '- one',
        '- two',
        '',
        '[Report Link](https://x/a.pdf)',
        '',
        '**2025-09-09,Other**',
        '',
        '[Report Link](https://x/b.pdf)',
        ''
      ].join('\n')
    );
  });

  describe('orderEntries', () => {
    const entries = [
      entry({ itemId: 'c', date: '2025-09-08', source: 'Zeta' }),
      entry({ itemId: 'b', date: '2025-09-10', source: 'Beta' }),
      entry({ itemId: 'a', date: '2025-09-10', source: 'Alpha' })
    ];

    it('sorts by date descending then source', () => {
      expect(orderEntries(entries, 'sorted').map(e => e.itemId)).toEqual(['a', 'b', 'c']);
    });

    it('keeps completion order when asked to', () => {
      // Document order then depends on which worker finished first.
      expect(orderEntries(entries, 'completion').map(e => e.itemId)).toEqual(['c', 'b', 'a']);
    });
  });

  it('rebuilds the document from summaries already on disk', async () => {
    await writeFiles(config.paths.summaryDir, {
      'a1.md': '**2025-09-11,Alpha: First**\n- a point',
      'b2.md': '**2025-09-10,Beta: Second**\n- b point',
      'c3.md': '**2025-09-09,Gamma: Third**\n- c point'
    });
    await writeFiles(config.paths.storeDir, { 'b2.md': 'stored article' });

    const refs = await findRecoverableSummaries(config);
    expect(refs.map(ref => ref.fileName)).toEqual(['a1.pdf', 'b2.md', 'c3.pdf']);

    const target = await assembleHighlights(refs, config);

    expect(target).toBe(highlightsPath(config));
    await expect(fs.readFile(highlightsPath(config), 'utf-8')).resolves.toBe(
      [
        '# Sellside highlights for Week – 2025-09-12',
        '',
        '**2025-09-11,Alpha: First**',
        '',
        '- a point',
        '',
        '[Report Link](https://files.example.com/2025-09-12/a1.pdf)',
        '',
        '**2025-09-10,Beta: Second**',
        '',
        '- b point',
        '',
        '[Report Link](https://files.example.com/2025-09-12/b2.md)',
        '',
        '**2025-09-09,Gamma: Third**',
        '',
        '- c point',
        '',
        '[Report Link](https://files.example.com/2025-09-12/c3.pdf)',
        ''
      ].join('\n')
    );
  });

  it('uses the cleaned text to date a summary without one', async () => {
    await writeFiles(config.paths.summaryDir, { 'x.md': '**BigBank: Outlook**\n- steady' });
    await writeFiles(config.paths.cleanedDir, { 'x.md': 'BigBank research, 5 September 2025' });

    await assembleHighlights(await findRecoverableSummaries(config), config);

    const content = await fs.readFile(highlightsPath(config), 'utf-8');
    expect(content.split('\n')[2]).toBe('**2025-09-05,BigBank: Outlook**');
  });

  it('skips unreadable summaries and writes nothing when none remain', async () => {
    const target = await assembleHighlights(
      [{ itemId: 'gone', fileName: 'gone.pdf', summaryPath: path.join(config.paths.summaryDir, 'gone.md') }],
      config
    );

    expect(target).toBeUndefined();
    await expect(fs.readdir(config.paths.finalDir)).rejects.toThrow();
  });

  it('lists one stored document per item id', async () => {
    await writeFiles(config.paths.storeDir, { 'same.md': 'x', 'same.pdf': 'y' });

    const items = await findStagedItems(config);

    expect(items.map(item => item.fileName)).toEqual(['same.pdf']);
  });

  it('lists stored documents as staged items', async () => {
    await writeFiles(config.paths.storeDir, { 'abc.pdf': 'x', 'def.md': 'y', 'notes.json': '{}' });

    const items = await findStagedItems(config);

    expect(items.map(item => [item.itemId, item.fileName])).toEqual([
      ['abc', 'abc.pdf'],
      ['def', 'def.md']
    ]);
  });
});
