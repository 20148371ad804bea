import { describe, it, expect } from 'vitest';
import { buildRouteGraph, createRouteGraph } from '../../src/data/routeGraph';
import { InvalidDistanceError, UnknownLocationError } from '../../src/engine/errors';

describe('Route graph', () => {
  it('adds a location once and reports duplicates as exists', () => {
    const graph = createRouteGraph();
    expect(graph.addLocation('Depot')).toBe('added');
    expect(graph.addLocation('Depot')).toBe('exists');
    expect(graph.size).toBe(1);
    expect(graph.locations()).toEqual(['Depot']);
  });

  it('adding a location twice is observably the same as adding it once', () => {
    const once = createRouteGraph();
    once.addLocation('A');
    once.addLocation('B');
    once.addRoute('A', 'B', 3);

    const twice = createRouteGraph();
    twice.addLocation('A');
    twice.addLocation('B');
    twice.addRoute('A', 'B', 3);
    twice.addLocation('A');

    expect(twice.locations()).toEqual(once.locations());
    expect([...twice.neighborsOf('A')]).toEqual([...once.neighborsOf('A')]);
  });

  it('stores routes in both directions', () => {
    const graph = createRouteGraph();
    graph.addLocation('A');
    graph.addLocation('B');
    expect(graph.addRoute('A', 'B', 7)).toBe('added');
    expect(graph.neighborsOf('A').get('B')).toBe(7);
    expect(graph.neighborsOf('B').get('A')).toBe(7);
    expect(graph.distanceBetween('B', 'A')).toBe(7);
  });

  it('re-adding a route overwrites the previous distance', () => {
    const graph = createRouteGraph();
    graph.addLocation('A');
    graph.addLocation('B');
    graph.addRoute('A', 'B', 7);
    graph.addRoute('B', 'A', 2);
    expect(graph.distanceBetween('A', 'B')).toBe(2);
    expect(graph.neighborsOf('A').size).toBe(1);
  });

  it('rejects routes between unknown locations and leaves the graph unchanged', () => {
    const graph = createRouteGraph();
    graph.addLocation('Depot');
    expect(() => graph.addRoute('X', 'Y', 4)).toThrow(UnknownLocationError);
    expect(() => graph.addRoute('Depot', 'Y', 4)).toThrow('Unknown location(s): Y');
    expect(graph.locations()).toEqual(['Depot']);
    expect(graph.neighborsOf('Depot').size).toBe(0);
  });

  it('names every missing endpoint', () => {
    const graph = createRouteGraph();
    try {
      graph.addRoute('X', 'Y', 4);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownLocationError);
      if (err instanceof UnknownLocationError) {
        expect(err.missing).toEqual(['X', 'Y']);
        expect(err.code).toBe('UNKNOWN_LOCATION');
      }
    }
  });

  it('rejects negative and fractional distances', () => {
    const graph = createRouteGraph();
    graph.addLocation('A');
    graph.addLocation('B');
    expect(() => graph.addRoute('A', 'B', -1)).toThrow(InvalidDistanceError);
    expect(() => graph.addRoute('A', 'B', 1.5)).toThrow(InvalidDistanceError);
    expect(graph.distanceBetween('A', 'B')).toBeNull();
  });

  it('rejects distances beyond the safe integer range', () => {
    const graph = createRouteGraph();
    graph.addLocation('A');
    graph.addLocation('B');
    expect(() => graph.addRoute('A', 'B', 1e308)).toThrow(InvalidDistanceError);
    expect(() => graph.addRoute('A', 'B', 2 ** 53)).toThrow(InvalidDistanceError);
    expect(() => graph.addRoute('A', 'B', Infinity)).toThrow(InvalidDistanceError);
    expect(graph.distanceBetween('A', 'B')).toBeNull();
    expect(graph.addRoute('A', 'B', Number.MAX_SAFE_INTEGER)).toBe('added');
  });

  it('allows zero-distance routes', () => {
    const graph = createRouteGraph();
    graph.addLocation('A');
    graph.addLocation('B');
    graph.addRoute('A', 'B', 0);
    expect(graph.distanceBetween('A', 'B')).toBe(0);
  });

  it('returns no neighbors for unknown locations', () => {
    const graph = createRouteGraph();
    expect(graph.hasLocation('Nowhere')).toBe(false);
    expect(graph.neighborsOf('Nowhere').size).toBe(0);
    expect(graph.distanceBetween('Nowhere', 'Else')).toBeNull();
  });

  it('keeps independent graphs separate', () => {
    const a = createRouteGraph();
    const b = createRouteGraph();
    a.addLocation('Depot');
    expect(b.hasLocation('Depot')).toBe(false);
  });

  it('builds a graph from a network description', () => {
    const graph = buildRouteGraph({
      locations: ['Depot', 'A', 'B'],
      routes: [
        { start: 'Depot', end: 'A', distance: 5 },
        { start: 'A', end: 'B', distance: 3 },
      ],
    });
    expect(graph.locations()).toEqual(['Depot', 'A', 'B']);
    expect(graph.distanceBetween('B', 'A')).toBe(3);
    expect(graph.distanceBetween('Depot', 'B')).toBeNull();
  });
});
