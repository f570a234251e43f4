import { describe, it, expect } from 'vitest';
import { LinkGraph, buildBacklinkIndex } from '../src/graph/builder.js';
import { buildNotes } from './helpers.js';

describe('LinkGraph', () => {
  const notes = buildNotes({
    'A.md': 'Links to [[B]] and [[C]]',
    'B.md': 'Links to [[C]]',
    'C.md': 'No links',
    'D.md': 'Links to [[Missing]]',
    'E.md': 'Alone',
    'F.md': 'Links to [[G]]',
    'G.md': 'Target',
  });
  const graph = new LinkGraph(notes);

  describe('buildBacklinkIndex', () => {
    it('should invert links and drop dangling targets', () => {
      const index = buildBacklinkIndex(notes);
      expect([...index.keys()]).toEqual(['B', 'C', 'G']);
      expect([...(index.get('C') ?? [])]).toEqual(['A', 'B']);
      expect(index.has('Missing')).toBe(false);
    });
  });

  describe('backlinks and outlinks', () => {
    it('should return notes linking to a note', () => {
      expect(graph.getBacklinks('C')).toEqual(['A', 'B']);
      expect(graph.getBacklinks('A')).toEqual([]);
      expect(graph.getBacklinks('Unknown')).toEqual([]);
    });

    it('should only return outlinks that resolve', () => {
      expect(graph.getOutlinks('A')).toEqual(['B', 'C']);
      expect(graph.getOutlinks('D')).toEqual([]);
    });
  });

  describe('orphans', () => {
    it('should count dangling links as outgoing', () => {
      expect(graph.isOrphaned('D')).toBe(false);
      expect(graph.isOrphaned('E')).toBe(true);
      expect(graph.isOrphaned('Unknown')).toBe(false);
    });

    it('should find every orphaned note', () => {
      expect(graph.findOrphanedNotes()).toEqual(['E']);
    });
  });

  describe('getNode', () => {
    it('should describe a note with its resolved links', () => {
      expect(graph.getNode('A')).toEqual({
        name: 'A',
        relPath: 'A.md',
        tags: [],
        outlinks: ['B', 'C'],
        inlinks: [],
      });
      expect(graph.getNode('Unknown')).toBeUndefined();
    });
  });

  describe('getHubNotes', () => {
    it('should rank notes by degree', () => {
      expect(graph.getHubNotes(3)).toEqual([
        { name: 'A', degree: 2 },
        { name: 'B', degree: 2 },
        { name: 'C', degree: 2 },
      ]);
    });
  });

  describe('getClusters', () => {
    it('should return undirected components of at least minSize', () => {
      expect(graph.getClusters()).toEqual([['A', 'B', 'C'], ['F', 'G']]);
      expect(graph.getClusters(1)).toHaveLength(4);
    });
  });

  describe('findShortestPath', () => {
    it('should follow links in either direction', () => {
      expect(graph.findShortestPath('C', 'A')).toEqual(['C', 'A']);
    });

    it('should find multi-hop paths', () => {
      const chain = new LinkGraph(buildNotes({
        'X.md': '[[Y]]',
        'Y.md': '[[Z]]',
        'Z.md': 'end',
      }));
      expect(chain.findShortestPath('X', 'Z')).toEqual(['X', 'Y', 'Z']);
    });

    it('should return null when unreachable or unknown', () => {
      expect(graph.findShortestPath('A', 'G')).toBeNull();
      expect(graph.findShortestPath('A', 'Unknown')).toBeNull();
    });

    it('should return a single node path for the same note', () => {
      expect(graph.findShortestPath('A', 'A')).toEqual(['A']);
    });
  });

  describe('getStats', () => {
    it('should compute graph statistics', () => {
      const stats = graph.getStats();
      expect(stats.totalNodes).toBe(7);
      expect(stats.totalEdges).toBe(4);
      expect(stats.orphanedNodes).toBe(1);
      expect(stats.averageConnections).toBeCloseTo(8 / 7);
      expect(stats.density).toBeCloseTo(4 / 42);
      expect(stats.components).toBe(4);
    });

    it('should handle an empty collection', () => {
      expect(new LinkGraph(new Map()).getStats()).toEqual({
        totalNodes: 0,
        totalEdges: 0,
        orphanedNodes: 0,
        averageConnections: 0,
        density: 0,
        components: 0,
      });
    });
  });

  describe('exportGraph', () => {
    it('should list resolved edges', () => {
      expect(graph.exportGraph().edges).toEqual([
        { source: 'A', target: 'B' },
        { source: 'A', target: 'C' },
        { source: 'B', target: 'C' },
        { source: 'F', target: 'G' },
      ]);
    });
  });
});
