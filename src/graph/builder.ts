/**
 * Backlink graph over a loaded note collection
 */

import type { BacklinkIndex, GraphNode, GraphStats, Note, NoteCollection } from '../types.js';

/**
 * Invert every note's outgoing links. Targets with no corresponding note are
 * dropped, so dangling links never appear in the index.
 */
export function buildBacklinkIndex(notes: NoteCollection): Map<string, Set<string>> {
  const index = new Map<string, Set<string>>();
  for (const [name, note] of notes) {
    for (const target of note.links) {
      if (!notes.has(target)) continue;
      let sources = index.get(target);
      if (!sources) {
        sources = new Set();
        index.set(target, sources);
      }
      sources.add(name);
    }
  }
  return index;
}

/**
 * A note is orphaned when nothing links to it and it links to nothing.
 * Outgoing links count even when their target does not exist.
 */
export function isOrphaned(note: Note, index: BacklinkIndex): boolean {
  return (index.get(note.name)?.size ?? 0) === 0 && note.links.length === 0;
}

/**
 * Read-only graph view. Built once per analysis pass; a changed note set
 * needs a new LinkGraph.
 */
export class LinkGraph {
  readonly notes: NoteCollection;
  readonly backlinks: BacklinkIndex;

  constructor(notes: NoteCollection) {
    this.notes = notes;
    this.backlinks = buildBacklinkIndex(notes);
  }

  getBacklinks(name: string): string[] {
    return Array.from(this.backlinks.get(name) ?? []);
  }

  /**
   * Outgoing links that resolve to a note in the collection
   */
  getOutlinks(name: string): string[] {
    const note = this.notes.get(name);
    if (!note) return [];
    return note.links.filter(target => this.notes.has(target));
  }

  isOrphaned(name: string): boolean {
    const note = this.notes.get(name);
    return note ? isOrphaned(note, this.backlinks) : false;
  }

  findOrphanedNotes(): string[] {
    return Array.from(this.notes.values())
      .filter(note => isOrphaned(note, this.backlinks))
      .map(note => note.name);
  }

  getNode(name: string): GraphNode | undefined {
    const note = this.notes.get(name);
    if (!note) return undefined;
    return {
      name,
      relPath: note.relPath,
      tags: note.tags,
      outlinks: this.getOutlinks(name),
      inlinks: this.getBacklinks(name),
    };
  }

  getAllNodes(): GraphNode[] {
    const nodes: GraphNode[] = [];
    for (const name of this.notes.keys()) {
      const node = this.getNode(name);
      if (node) nodes.push(node);
    }
    return nodes;
  }

  /**
   * Most-connected notes by degree (resolved outlinks + backlinks)
   */
  getHubNotes(limit = 10): Array<{ name: string; degree: number }> {
    return Array.from(this.notes.keys())
      .map(name => ({ name, degree: this.getOutlinks(name).length + this.getBacklinks(name).length }))
      .sort((a, b) => b.degree - a.degree)
      .slice(0, limit);
  }

  /**
   * Connected components, treating links as undirected
   */
  getClusters(minSize = 2): string[][] {
    const visited = new Set<string>();
    const clusters: string[][] = [];

    for (const name of this.notes.keys()) {
      if (visited.has(name)) continue;
      const component = this.bfsVisit(name, visited);
      if (component.length >= minSize) {
        clusters.push(component);
      }
    }

    return clusters;
  }

  /**
   * Shortest undirected path between two notes, or null if unreachable
   */
  findShortestPath(source: string, target: string): string[] | null {
    if (!this.notes.has(source) || !this.notes.has(target)) return null;
    if (source === target) return [source];

    const previous = new Map<string, string>();
    const visited = new Set<string>([source]);
    const queue = [source];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;

      for (const neighbor of this.neighbors(current)) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        previous.set(neighbor, current);

        if (neighbor === target) {
          const path = [target];
          let step = previous.get(target);
          while (step !== undefined) {
            path.unshift(step);
            step = previous.get(step);
          }
          return path;
        }
        queue.push(neighbor);
      }
    }

    return null;
  }

  getStats(): GraphStats {
    const totalNodes = this.notes.size;
    let totalEdges = 0;
    let totalDegree = 0;
    for (const name of this.notes.keys()) {
      const out = this.getOutlinks(name).length;
      totalEdges += out;
      totalDegree += out + this.getBacklinks(name).length;
    }
    const maxPossibleEdges = totalNodes * (totalNodes - 1);

    return {
      totalNodes,
      totalEdges,
      orphanedNodes: this.findOrphanedNotes().length,
      averageConnections: totalNodes > 0 ? totalDegree / totalNodes : 0,
      density: maxPossibleEdges > 0 ? totalEdges / maxPossibleEdges : 0,
      components: this.getClusters(1).length,
    };
  }

  exportGraph(): { nodes: GraphNode[]; edges: Array<{ source: string; target: string }> } {
    const nodes = this.getAllNodes();
    const edges = nodes.flatMap(node => node.outlinks.map(target => ({ source: node.name, target })));
    return { nodes, edges };
  }

  private neighbors(name: string): string[] {
    return [...this.getOutlinks(name), ...this.getBacklinks(name)];
  }

  private bfsVisit(start: string, visited: Set<string>): string[] {
    const component: string[] = [];
    const queue = [start];
    visited.add(start);

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      component.push(current);

      for (const neighbor of this.neighbors(current)) {
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          queue.push(neighbor);
        }
      }
    }

    return component;
  }
}
