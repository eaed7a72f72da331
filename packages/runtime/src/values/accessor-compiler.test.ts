// Tests for accessor compilation

import { describe, it, expect, vi } from 'vitest';
import { AccessorCompilationError } from '../errors.js';
import { createCapturingLogger, silentLogger } from '../logger.js';
import {
  AccessorCompiler,
  LIST_END,
  LIST_START,
  RECORD_END,
  RECORD_START,
  TRUNCATED,
  compileExtractor,
  extractByReflection,
  flattenComponents,
  flattenStructured,
  isStructuredValue,
} from './accessor-compiler.js';
import { ValueObject } from './value-object.js';

class Point extends ValueObject {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    super();
    this.x = x;
    this.y = y;
  }
}

class Labels extends ValueObject {
  readonly items: string[] | null;

  constructor(items: string[] | null) {
    super();
    this.items = items;
  }
}

class Polygon extends ValueObject {
  readonly name: string;
  readonly corners: Point[];

  constructor(name: string, corners: Point[]) {
    super();
    this.name = name;
    this.corners = corners;
  }
}

describe('compileExtractor', () => {
  it('reads every property in order', () => {
    const extract = compileExtractor(Object, ['b', 'a']);
    expect(extract({ a: 1, b: 2 })).toEqual([2, 1]);
  });

  it('handles property names that are not identifiers', () => {
    const extract = compileExtractor(Object, ['first name', 'say "hi"']);
    expect(extract({ 'first name': 'Ada', 'say "hi"': true })).toEqual(['Ada', true]);
  });

  it('returns no components for a type without properties', () => {
    expect(compileExtractor(Object, [])({})).toEqual([]);
  });
});

describe('flattenStructured', () => {
  it('delimits nested lists', () => {
    expect(flattenStructured([1, [2, 3]])).toEqual([
      LIST_START,
      1,
      LIST_START,
      2,
      3,
      LIST_END,
      LIST_END,
    ]);
  });

  it('orders record keys', () => {
    expect(flattenStructured({ b: 1, a: 2 })).toEqual([RECORD_START, 'a', 2, 'b', 1, RECORD_END]);
  });

  it('truncates cyclic structures', () => {
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);

    const flattened = flattenStructured(cyclic);

    expect(flattened).toHaveLength(33);
    expect(flattened[16]).toBe(TRUNCATED);
  });
});

describe('isStructuredValue', () => {
  it('matches collections and plain records only', () => {
    expect(isStructuredValue([1])).toBe(true);
    expect(isStructuredValue(new Map())).toBe(true);
    expect(isStructuredValue({ a: 1 })).toBe(true);
    expect(isStructuredValue('text')).toBe(false);
    expect(isStructuredValue(new Date())).toBe(false);
    expect(isStructuredValue(new Point(1, 2))).toBe(false);
  });
});

describe('AccessorCompiler', () => {
  it('produces the same components compiled and by reflection', () => {
    const compiled = new AccessorCompiler({ logger: silentLogger });
    const reflective = new AccessorCompiler({ enabled: false, logger: silentLogger });
    const point = new Point(3, 4);

    expect(compiled.extract(point)).toEqual([3, 4]);
    expect(reflective.extract(point)).toEqual([3, 4]);
    expect(compiled.isOptimized(Point)).toBe(true);
    expect(reflective.isOptimized(Point)).toBe(false);
  });

  it('flattens collection components on the reflection path', () => {
    const compiler = new AccessorCompiler({ logger: silentLogger });
    const corner = new Point(0, 0);
    const polygon = new Polygon('dot', [corner]);

    expect(compiler.extract(polygon)).toEqual(['dot', LIST_START, corner, LIST_END]);
    expect(extractByReflection(polygon, ['name', 'corners'])).toEqual([
      'dot',
      LIST_START,
      corner,
      LIST_END,
    ]);
  });

  it('discovers properties from the first instance', () => {
    const compiler = new AccessorCompiler({ logger: silentLogger });

    expect(compiler.getProperties(Point)).toBeUndefined();
    compiler.extract(new Point(1, 2));
    expect(compiler.getProperties(Point)).toEqual(['x', 'y']);
  });

  it('counts optimized and disabled types until cleared', () => {
    const compiler = new AccessorCompiler({ logger: silentLogger });
    compiler.extract(new Point(1, 2));
    compiler.extract(new Point(3, 4));
    compiler.extract(new Polygon('empty', []));

    expect(compiler.getCacheStats()).toEqual({ optimizedTypes: 1, disabledTypes: 1, totalTypes: 2 });

    compiler.clearCaches();
    expect(compiler.getCacheStats()).toEqual({ optimizedTypes: 0, disabledTypes: 0, totalTypes: 0 });
    expect(compiler.isOptimized(Point)).toBeUndefined();
  });

  it('flattens a collection held by a type compiled from a null sample', () => {
    const compiler = new AccessorCompiler({ logger: silentLogger });
    compiler.extract(new Labels(null));

    expect(compiler.isOptimized(Labels)).toBe(true);
    expect(compiler.extract(new Labels(['a', 'b']))).toEqual([LIST_START, 'a', 'b', LIST_END]);
    expect(compiler.extract(new Labels(null))).toEqual([null]);
  });

  it('falls back to reflection when code generation fails', () => {
    const logger = createCapturingLogger();
    const compile = vi.fn(() => {
      throw new AccessorCompilationError('Point', 'code generation disallowed');
    });
    const compiler = new AccessorCompiler({ logger, compile });

    expect(compiler.extract(new Point(1, 2))).toEqual([1, 2]);
    expect(compiler.extract(new Point(3, 4))).toEqual([3, 4]);
    expect(compiler.extract(new Point(5, 6))).toEqual([5, 6]);

    expect(compile).toHaveBeenCalledTimes(1);
    expect(compiler.isOptimized(Point)).toBe(false);
    expect(compiler.getCacheStats()).toEqual({ optimizedTypes: 0, disabledTypes: 1, totalTypes: 1 });

    const warnings = logger.entries.filter((entry) => entry.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      message: 'Accessor compilation failed, using reflection',
      data: { type: 'Point' },
    });
  });
});

describe('flattenComponents', () => {
  it('returns the same array when nothing is structured', () => {
    const components = [1, 'a', null];
    expect(flattenComponents(components)).toBe(components);
  });

  it('splices collections and records inline', () => {
    expect(flattenComponents(['x', [1, 2], { b: 2, a: 1 }])).toEqual([
      'x',
      LIST_START,
      1,
      2,
      LIST_END,
      RECORD_START,
      'a',
      1,
      'b',
      2,
      RECORD_END,
    ]);
  });
});
