'use strict';

import * as _ from 'lodash';
import type { SimulationLinkDatum, SimulationNodeDatum } from 'd3-force';
import type Automaton from '../Automaton';
import { UnknownStateError } from '../AutomatonError';
import type { SimulationTrace } from '../simulator';
import { toSymbols } from '../parser-utils';
import { EPSILON } from '../TransitionSpec';
import type { DFATransition } from '../TransitionSpec';

export interface Vertex extends SimulationNodeDatum {
  label: string,
  isInitial: boolean,
  isFinal: boolean,
  outTrans: {
    [symbol: string]: OutTransition
  }
}

export interface OutTransition {
  transition: DFATransition,
  edge: LayoutEdge
}

export interface VertexLUT {
  [state: string]: Vertex
}

// SimulationLinkDatum<NodeDatum extends SimulationNodeDatum>
export interface LayoutEdge extends SimulationLinkDatum<Vertex> {
  source: Vertex,
  target: Vertex,
  labels: string[]
}

type Graph = {vertices: VertexLUT, edges: LayoutEdge[]};

// own properties only: state ids may collide with Object.prototype members
function lookup<T>(lut: {[key: string]: T}, key: string): T | undefined {
  return _.has(lut, key) ? lut[key] : undefined;
}

function labelFor(trans: DFATransition): string {
  return trans.read === EPSILON ? 'ε' : visibleSpace(trans.read);
}

// replace ' ' with '␣'.
function visibleSpace(c: string): string {
  return (c === ' ') ? '␣' : c;
}

/**
 * Use a model to derive the graph (vertices & edges) for a D3 diagram.
 * Edges with the same source and target are combined.
 */
function deriveGraph(model: Automaton): Graph {
  // 1. Create all the vertices, so that edges can point at any of them.
  let vertices: VertexLUT = _.fromPairs(model.states.map((state): [string, Vertex] =>
    [state.id, {
      label: state.id,
      isInitial: state.isInitial,
      isFinal: state.isFinal,
      outTrans: {}
    }]));

  // 2. Create the edges, one per (source, target) pair.
  let edges: LayoutEdge[] = [];
  _.forEach(_.groupBy(model.transitions, 'from'), (transitions, from) => {
    let vertex = vertices[from];
    let cache = new Map<string, LayoutEdge>();

    transitions.forEach((trans) => {
      let edge = cache.get(trans.to);
      if (edge === undefined) {
        edge = { source: vertex, target: vertices[trans.to], labels: [] };
        cache.set(trans.to, edge);
        edges.push(edge);
      }
      edge.labels.push(labelFor(trans));
      vertex.outTrans[trans.read] = { transition: trans, edge };
    });
  });

  edges.forEach((edge) => { edge.labels.sort(); });

  return {vertices, edges};
}

/**
 * Aids rendering and animating an automaton in D3.
 *
 * • Generates the vertices and edges ("nodes" and "links") for a D3 diagram.
 * • Provides mapping of each state to its vertex and each transition to its edge.
 */
export default class StateGraph {
  private readonly derived: Graph;

  constructor (model: Automaton) {
    this.derived = deriveGraph(model);
  }

  /**
   * Returns the mapping from states to vertices (D3 layout "nodes").
   */
  public getVertexMap (): VertexLUT {
    return this.derived.vertices;
  }

  /**
   * D3 layout "nodes".
   */
  public getVertices (): Vertex[] {
    return _.values(this.derived.vertices);
  }

  /**
   * D3 layout "links".
   */
  public getEdges (): LayoutEdge[] {
    return this.derived.edges;
  }

  /**
   * Look up a state's corresponding D3 "node".
   */
  public getVertex (state: string): Vertex | undefined {
    return lookup(this.derived.vertices, state);
  }

  public getInstructionAndEdge (state: string, symbol: string): OutTransition | undefined {
    let vertex = lookup(this.derived.vertices, state);
    if (vertex === undefined) {
      throw new UnknownStateError(state);
    }

    return lookup(vertex.outTrans, symbol);
  }

  /**
   * The edge taken to arrive at step `index` of a trace; undefined at the
   * first step.
   */
  public edgeForStep (trace: SimulationTrace, index: number): LayoutEdge | undefined {
    if (index <= 0 || index >= trace.configurations.length) return undefined;

    let before = trace.configurations[index - 1];
    let symbol = toSymbols(trace.input)[before.consumed];
    return this.getInstructionAndEdge(before.state, symbol)?.edge;
  }
}
