import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { analyze } from '../pipeline';
import { hour, makeArticle, makeConfig } from './helpers';

const articles = [
  makeArticle({ id: 'a1', title: 'Quantum photonic testbed', sourceName: 'Lab Notes', category: 'science', publishedAt: hour(1) }),
  makeArticle({ id: 'a2', title: 'Quantum photonic interconnect', sourceName: 'Chip Wire', category: 'science', publishedAt: hour(2) }),
  makeArticle({ id: 'a3', title: 'Sourdough hydration', sourceName: 'Lab Notes', category: 'food', publishedAt: hour(3) }),
  makeArticle({ id: 'a4', title: '   ', sourceName: 'Chip Wire', publishedAt: hour(4) }),
];

const config = makeConfig({ topicWeights: { quantum: 5 } });

describe('analyze', () => {
  it('returns no clusters for no articles', () => {
    assert.deepEqual(analyze([], config), { totalArticles: 0, clusteredArticles: 0, clusters: [] });
  });

  it('clusters, scores and suggests angles', () => {
    const result = analyze(articles, config);

    assert.equal(result.totalArticles, 4);
    assert.equal(result.clusteredArticles, 3);
    assert.deepEqual(result.clusters.map(c => [c.rank, c.score, c.articles.map(a => a.id)]), [
      [1, 9, ['a1', 'a2']],
      [2, 2, ['a3']],
    ]);

    const [top] = result.clusters;
    assert.equal(top.headline, 'Quantum photonic testbed');
    assert.equal(top.dominantKeyword, 'photonic');
    assert.deepEqual(top.angles, ['Industry implications of photonic: practical takeaways for technical leaders']);
  });

  it('still clusters an article whose date is invalid', () => {
    const undated = makeArticle({ id: 'u1', title: 'Quantum photonic testbed', publishedAt: new Date('nope') });
    const result = analyze([undated], config);

    assert.equal(result.totalArticles, 1);
    assert.equal(result.clusteredArticles, 1);
    assert.deepEqual(result.clusters.map(c => c.articles.map(a => a.id)), [['u1']]);
  });

  it('limits the report to the top clusters', () => {
    const result = analyze(articles, { ...config, topN: 1 });
    assert.equal(result.clusters.length, 1);
    assert.equal(result.clusteredArticles, 3);
  });

  it('gives the same answer for the same input in any order', () => {
    const first = analyze(articles, config);
    const second = analyze([...articles].reverse(), config);
    assert.deepEqual(second, first);
  });

  it('leaves its input untouched', () => {
    const input = [...articles].reverse();
    const before = input.map(a => a.id);
    analyze(input, config);
    assert.deepEqual(input.map(a => a.id), before);
  });
});
