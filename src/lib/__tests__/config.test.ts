import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { DEFAULT_ANGLE_RULES } from '../angles';
import { ConfigError, loadConfig, parseConfig } from '../config';

const minimal = {
  sources: {
    ai: [
      { name: 'Model Notes', feed: 'https://models.example.com/feed.xml', topics: ['llm'] },
      { name: 'Reference Only', url: 'https://reference.example.com' },
    ],
  },
  topic_weights: { LLM: 2, voip: 1 },
};

function issuesOf(raw: unknown): string[] {
  try {
    parseConfig(raw);
  } catch (error) {
    assert.ok(error instanceof ConfigError);
    return error.issues;
  }
  assert.fail('expected a ConfigError');
}

describe('parseConfig', () => {
  it('fills defaults and flattens sources', () => {
    const config = parseConfig(minimal);

    assert.deepEqual(config.sources, [
      { name: 'Model Notes', feedUrl: 'https://models.example.com/feed.xml', category: 'ai', topics: ['llm'] },
    ]);
    assert.deepEqual(config.scoring, {
      topicWeights: { llm: 2, voip: 1 },
      diversityBonusFactor: 1,
      volumeFactor: 1,
      diversityMode: 'count',
      volumeMode: 'linear',
      similarity: 'jaccard',
      threshold: 0.15,
      lookbackDays: 7,
    });
    assert.deepEqual(config.keywords, { minLength: 3, extraStopwords: [] });
    assert.equal(config.topN, 5);
    assert.equal(config.maxAngles, 3);
    assert.equal(config.angles, DEFAULT_ANGLE_RULES);
  });

  it('reads explicit scoring, report and angle settings', () => {
    const config = parseConfig({
      ...minimal,
      lookback_days: 14,
      scoring: { diversity_bonus_factor: 2, volume_factor: 0.5, volume_mode: 'log', similarity: 'overlap', threshold: 0.4 },
      report: { top_n: 10, max_angles: 1 },
      angles: [{ match: ['rust'], angle: 'Rust take on {keyword}' }],
    });

    assert.equal(config.scoring.lookbackDays, 14);
    assert.equal(config.scoring.diversityBonusFactor, 2);
    assert.equal(config.scoring.volumeFactor, 0.5);
    assert.equal(config.scoring.volumeMode, 'log');
    assert.equal(config.scoring.similarity, 'overlap');
    assert.equal(config.scoring.threshold, 0.4);
    assert.equal(config.topN, 10);
    assert.equal(config.maxAngles, 1);
    assert.deepEqual(config.angles, [{ match: ['rust'], angle: 'Rust take on {keyword}' }]);
  });

  it('lets the caller override the lookback window', () => {
    assert.equal(parseConfig({ ...minimal, lookback_days: 14 }, { lookbackDays: 3 }).scoring.lookbackDays, 3);
  });

  it('rejects a missing weight table', () => {
    assert.deepEqual(issuesOf({ sources: minimal.sources }), ['topic_weights: Required']);
  });

  it('rejects negative factors and an out-of-range threshold', () => {
    const issues = issuesOf({ ...minimal, scoring: { volume_factor: -1, diversity_bonus_factor: -0.5, threshold: 1.5 } });
    assert.deepEqual(issues.map(i => i.split(':')[0]).sort(), [
      'scoring.diversity_bonus_factor',
      'scoring.threshold',
      'scoring.volume_factor',
    ]);
  });

  it('rejects unknown modes', () => {
    const issues = issuesOf({ ...minimal, scoring: { volume_mode: 'cubic' } });
    assert.equal(issues.length, 1);
    assert.ok(issues[0].startsWith('scoring.volume_mode:'));
  });
});

describe('loadConfig', () => {
  let dir = '';

  before(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'content-scout-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a sources file', async () => {
    const file = path.join(dir, 'sources.json');
    await writeFile(file, JSON.stringify(minimal));
    const config = await loadConfig(file);
    assert.equal(config.sources.length, 1);
  });

  it('fails on a missing file', async () => {
    await assert.rejects(loadConfig(path.join(dir, 'nope.json')), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.match(error.message, /^Cannot read sources file /);
      return true;
    });
  });

  it('fails on a file that is not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{ "sources": ');
    await assert.rejects(loadConfig(file), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.match(error.message, /is not valid JSON/);
      return true;
    });
  });
});
