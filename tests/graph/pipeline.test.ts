/**
 * End-to-end pipeline tests (texts in, laid-out graph out)
 */

import { buildConceptGraph } from '../../src/graph/pipeline';
import { DEFAULT_STOPWORDS } from '../../src/graph/stopwords';
import { resolveGraphConfig } from '../../src/lib/config';

const config = resolveGraphConfig();

describe('buildConceptGraph', () => {
  it('should build vocabulary, counts and pruned edges from the texts', () => {
    const result = buildConceptGraph(['Graph layout graph layout', 'graph layout'], DEFAULT_STOPWORDS, config);

    expect(result.distinctTerms).toBe(4);
    expect(result.vocabulary.map(entry => entry.term)).toEqual(['graph', 'graph layout', 'layout', 'layout graph']);
    expect(result.graph.nodes.map(node => [node.label, node.count])).toEqual([
      ['graph', 3],
      ['graph layout', 3],
      ['layout', 3],
      ['layout graph', 1],
    ]);
    expect(result.graph.edges).toEqual([
      { source: 0, target: 1, weight: 5 },
      { source: 0, target: 2, weight: 5 },
      { source: 1, target: 2, weight: 5 },
      { source: 0, target: 3, weight: 2 },
      { source: 1, target: 3, weight: 2 },
      { source: 2, target: 3, weight: 2 },
    ]);
    expect(result.layout.iterations).toBe(125);
  });

  it('should be reproducible run to run', () => {
    const texts = ['Concept graphs map terms to nodes.', 'Force layout places nodes; concept graphs cluster terms.'];
    const first = buildConceptGraph(texts, DEFAULT_STOPWORDS, config);
    const second = buildConceptGraph(texts, DEFAULT_STOPWORDS, config);

    expect(second.graph).toEqual(first.graph);
  });

  it('should cap the vocabulary at maxNodes', () => {
    const text = 'alpha bravo charlie delta echo foxtrot golf hotel india juliet';
    const result = buildConceptGraph([text], DEFAULT_STOPWORDS, resolveGraphConfig({ maxNodes: 5 }));

    expect(result.graph.nodes).toHaveLength(5);
    expect(result.graph.edges.length).toBeLessThanOrEqual(30);
  });

  it('should produce an empty graph when nothing survives tokenization', () => {
    const result = buildConceptGraph(['', 'the and of it'], DEFAULT_STOPWORDS, config);

    expect(result.graph).toEqual({ nodes: [], edges: [] });
    expect(result.vocabulary).toEqual([]);
    expect(result.layout.iterations).toBe(0);
  });

  it('should handle no documents at all', () => {
    const result = buildConceptGraph([], DEFAULT_STOPWORDS, config);

    expect(result.graph).toEqual({ nodes: [], edges: [] });
    expect(result.distinctTerms).toBe(0);
  });
});
