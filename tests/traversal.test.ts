/**
 * Traversal Engine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  loadTree,
  createTraversalEngine,
  sanitizeName,
  NameRegistry,
} from '../src/index.js';
import { raw, loginDashboardDocument, type RawNode } from './fixtures.js';

describe('sanitizeName', () => {
  it('should replace whitespace and illegal characters', () => {
    expect(sanitizeName('  Login Page ')).toBe('Login_Page');
    expect(sanitizeName('a/b:c')).toBe('a_b_c');
    expect(sanitizeName('Card   Large')).toBe('Card_Large');
  });

  it('should fall back to unnamed', () => {
    expect(sanitizeName('')).toBe('unnamed');
    expect(sanitizeName('   ')).toBe('unnamed');
    expect(sanitizeName('..')).toBe('unnamed');
  });

  it('should cap long names', () => {
    expect(sanitizeName('x'.repeat(150))).toHaveLength(100);
  });

  it('should not split a surrogate pair when capping', () => {
    expect(sanitizeName(`${'a'.repeat(99)}😀😀`)).toBe(`${'a'.repeat(99)}😀`);
  });
});

describe('NameRegistry', () => {
  it('should suffix repeated names', () => {
    const registry = new NameRegistry();

    expect(registry.claim('Card')).toBe('Card');
    expect(registry.claim('Card')).toBe('Card_2');
    expect(registry.claim('Card')).toBe('Card_3');
  });

  it('should compare names case-insensitively', () => {
    const registry = new NameRegistry();

    expect(registry.claim('Card')).toBe('Card');
    expect(registry.claim('card')).toBe('card_2');
    expect(registry.has('CARD_2')).toBe(true);
  });

  it('should skip a suffix already taken by a literal name', () => {
    const registry = new NameRegistry();

    registry.claim('Card');
    registry.claim('Card_2');
    expect(registry.claim('Card')).toBe('Card_3');
  });
});

describe('TraversalEngine', () => {
  it('should visit every node once in pre-order', () => {
    const engine = createTraversalEngine(loadTree(loginDashboardDocument()));
    const ids = Array.from(engine.visit(), node => node.id);

    expect(ids).toHaveLength(10);
    expect(new Set(ids).size).toBe(10);
    expect(ids[0]).toBe('0:0');
  });

  it('should select frames and skip wrapper groups', () => {
    const engine = createTraversalEngine(loadTree(loginDashboardDocument()));

    expect(engine.names()).toEqual([
      'Login_Page',
      'Submit_Button',
      'Dashboard',
      'Member_1',
      'Member_2',
      'Member_3',
    ]);
  });

  it('should keep a group that holds non-exportable content', () => {
    const tree = loadTree(
      raw('0:0', 'FRAME', 'Card', [
        raw('0:1', 'GROUP', 'Badge', [raw('0:2', 'TEXT', 'New'), raw('0:3', 'VECTOR', 'Star')]),
        raw('0:4', 'GROUP', 'Empty Group'),
      ])
    );

    expect(createTraversalEngine(tree).names()).toEqual(['Card', 'Badge']);
  });

  it('should skip zero-size frames', () => {
    const tree = loadTree(
      raw('0:0', 'DOCUMENT', 'Doc', [
        raw('1:1', 'FRAME', 'Hidden', undefined, {
          absoluteBoundingBox: { x: 0, y: 0, width: 120, height: 0 },
        }),
        raw('1:2', 'FRAME', 'Shown'),
      ])
    );

    expect(createTraversalEngine(tree).names()).toEqual(['Shown']);
  });

  it('should name colliding frames in traversal order', () => {
    const tree = loadTree(
      raw('0:0', 'DOCUMENT', 'Doc', [
        raw('1:1', 'FRAME', 'Card'),
        raw('1:2', 'FRAME', 'card'),
        raw('1:3', 'FRAME', 'Card'),
        raw('1:4', 'INSTANCE', ''),
      ])
    );

    expect(createTraversalEngine(tree).names()).toEqual(['Card', 'card_2', 'Card_3', 'unnamed']);
  });

  it('should yield the same names on every run', () => {
    const engine = createTraversalEngine(loadTree(loginDashboardDocument()));
    const first = engine.names();

    expect(engine.names()).toEqual(first);
    expect(Array.from(engine, unit => unit.name)).toEqual(first);
  });

  it('should stop after maxUnits', () => {
    const engine = createTraversalEngine(loadTree(loginDashboardDocument()), { maxUnits: 2 });

    expect(engine.names()).toEqual(['Login_Page', 'Submit_Button']);
  });

  it('should count exportable nodes past maxUnits', () => {
    const engine = createTraversalEngine(loadTree(loginDashboardDocument()), { maxUnits: 2 });

    engine.names();
    expect(engine.skipped).toBe(4);

    const unlimited = createTraversalEngine(loadTree(loginDashboardDocument()));
    unlimited.names();
    expect(unlimited.skipped).toBe(0);
  });

  it('should handle deeply nested groups', () => {
    // Innermost group holds text, so groups alternate between kept and skipped
    let node: RawNode = raw('g:5999', 'GROUP', 'Layer', [raw('t:0', 'TEXT', 'Label')]);
    for (let i = 5998; i >= 0; i--) {
      node = raw(`g:${i}`, 'GROUP', 'Layer', [node]);
    }

    const names = createTraversalEngine(loadTree(node)).names();

    expect(names).toHaveLength(3000);
    expect(names.slice(0, 3)).toEqual(['Layer', 'Layer_2', 'Layer_3']);
  });

  it('should yield nothing for an empty tree', () => {
    expect(createTraversalEngine(loadTree(null)).names()).toEqual([]);
  });

  it('should produce units lazily', () => {
    const units = createTraversalEngine(loadTree(loginDashboardDocument())).units();

    expect(units.next().value?.name).toBe('Login_Page');
  });
});

describe('ExportableUnit', () => {
  it('should move from pending to a final status once', () => {
    const [unit] = createTraversalEngine(loadTree(loginDashboardDocument())).units();

    expect(unit.status).toBe('pending');
    unit.markSucceeded('out/Login_Page.png');
    expect(unit.status).toBe('succeeded');
    expect(unit.path).toBe('out/Login_Page.png');
    expect(() => unit.markFailed({ kind: 'render', message: 'late' })).toThrow(
      'Unit "Login_Page" already succeeded'
    );
  });
});
