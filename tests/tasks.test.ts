/**
 * Task Classification Tests
 */

import { describe, it, expect } from 'vitest';
import {
  loadTree,
  createClassificationEngine,
  defaultRules,
  parseRules,
  deduplicate,
  tokenize,
  containsKeyword,
  EmptyTreeError,
  type TaskReport,
} from '../src/index.js';
import { raw, loginDashboardDocument } from './fixtures.js';

function descriptions(report: TaskReport): Record<string, string[]> {
  return {
    FRONTEND: report.tasks.FRONTEND.map(task => task.description),
    BACKEND: report.tasks.BACKEND.map(task => task.description),
    AI: report.tasks.AI.map(task => task.description),
  };
}

describe('tokenize', () => {
  it('should split camel case, separators and acronyms', () => {
    expect(tokenize('LoginPage')).toEqual(['login', 'page']);
    expect(tokenize('login-page')).toEqual(['login', 'page']);
    expect(tokenize('  Login   Page ')).toEqual(['login', 'page']);
    expect(tokenize('HTMLInput')).toEqual(['html', 'input']);
  });
});

describe('containsKeyword', () => {
  it('should match whole tokens and token runs', () => {
    expect(containsKeyword(['sign', 'in', 'form'], 'sign in')).toBe(true);
    expect(containsKeyword(['signin'], 'sign in')).toBe(false);
    expect(containsKeyword(['blogin'], 'login')).toBe(false);
  });

  it('should accept a plural on the last token', () => {
    expect(containsKeyword(['buttons'], 'button')).toBe(true);
    expect(containsKeyword(['live', 'chats'], 'chat')).toBe(true);
  });
});

describe('ClassificationEngine', () => {
  it('should infer tasks for a login and dashboard design', () => {
    const report = createClassificationEngine().classify(loadTree(loginDashboardDocument()));

    expect(descriptions(report)).toEqual({
      FRONTEND: [
        'Implement Login Page page/screen',
        'Build Login Page form with fields: Email, Password',
        'Create form validation for Email',
        'Create form validation for Password',
        'Implement Submit Button functionality',
      ],
      BACKEND: [
        'Implement user authentication system',
        'Set up session management',
        'Implement credential verification endpoint for Login Page',
        'Create data validation middleware',
        'Implement CRUD operations',
        'Create API endpoint for Dashboard',
        'Implement database schema for Dashboard',
        'Create API endpoint for Team List',
        'Implement database schema for Team List',
        'Implement paginated data feed for Team List',
      ],
      AI: [],
    });
    expect(report.tasks.BACKEND.map(task => task.number)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('should keep the producing rule and node', () => {
    const report = createClassificationEngine().classify(loadTree(loginDashboardDocument()));

    expect(report.tasks.FRONTEND[1]).toEqual({
      number: 2,
      description: 'Build Login Page form with fields: Email, Password',
      ruleId: 'fe.form',
      nodeIds: ['1:1'],
    });
  });

  it('should merge duplicate descriptions per category', () => {
    const tree = loadTree(
      raw('0:0', 'DOCUMENT', 'Doc', [
        raw('1:1', 'FRAME', 'Login Button'),
        raw('1:2', 'FRAME', 'Login  Button'),
      ])
    );

    const report = createClassificationEngine().classify(tree);

    expect(report.candidates).toHaveLength(6);
    expect(report.tasks.FRONTEND).toEqual([
      {
        number: 1,
        description: 'Implement Login Button functionality',
        ruleId: 'fe.button',
        nodeIds: ['1:1', '1:2'],
      },
    ]);
    expect(descriptions(report).BACKEND).toEqual([
      'Implement user authentication system',
      'Set up session management',
    ]);
  });

  it('should give the same report for the same tree', () => {
    const tree = loadTree(loginDashboardDocument());
    const engine = createClassificationEngine();

    expect(engine.classify(tree)).toEqual(engine.classify(tree));
  });

  it('should reject an empty tree', () => {
    expect(() => createClassificationEngine().classify(loadTree(null))).toThrow(EmptyTreeError);
  });

  it('should report image nodes once as an AI task', () => {
    const tree = loadTree(
      raw('0:0', 'FRAME', 'Gallery', [
        raw('0:1', 'RECTANGLE', 'Photo Upload', undefined, { fills: [{ type: 'IMAGE' }] }),
      ])
    );

    const report = createClassificationEngine().classify(tree);

    expect(descriptions(report).AI).toEqual([
      'Implement image processing and optimization',
      'Add content analysis and tagging',
    ]);
    expect(report.tasks.AI[0]?.nodeIds).toEqual(['0:1']);
  });

  it('should not treat differently named children as a feed', () => {
    const tree = loadTree(
      raw('0:0', 'FRAME', 'Products', [
        raw('0:1', 'FRAME', 'Card 1'),
        raw('0:2', 'FRAME', 'Card 2'),
        raw('0:3', 'FRAME', 'Banner'),
      ])
    );

    expect(createClassificationEngine().classify(tree).tasks.BACKEND).toEqual([]);
  });

  it('should detect repeated children with numbered names', () => {
    const tree = loadTree(
      raw('0:0', 'FRAME', 'Products', [
        raw('0:1', 'FRAME', 'Card 1'),
        raw('0:2', 'FRAME', 'Card 2'),
        raw('0:3', 'FRAME', 'Card 3'),
      ])
    );

    expect(descriptions(createClassificationEngine().classify(tree)).BACKEND).toEqual([
      'Implement paginated data feed for Products',
    ]);
  });
});

describe('custom rules', () => {
  const yamlRules = `
version: 1
rules:
  - id: ai.cart
    category: AI
    matcher:
      kind: keyword
      keywords: [cart]
    template: Recommend items for {name}
  - id: fe.frame
    category: FRONTEND
    matcher:
      kind: type
      types: [FRAME]
    template: Lay out {name}
`;

  it('should load rules from YAML', () => {
    const rules = parseRules(yamlRules, 'rules.yml');
    const tree = loadTree(
      raw('0:0', 'FRAME', 'Shopping Cart', [raw('0:1', 'FRAME', '')])
    );

    const report = createClassificationEngine(rules).classify(tree);

    expect(descriptions(report)).toEqual({
      FRONTEND: ['Lay out Shopping Cart', 'Lay out unnamed frame'],
      BACKEND: [],
      AI: ['Recommend items for Shopping Cart'],
    });
  });

  it('should reject duplicate rule ids', () => {
    const content = JSON.stringify({
      version: 1,
      rules: [
        { id: 'x', category: 'AI', matcher: { kind: 'type', types: ['FRAME'] }, template: 'a' },
        { id: 'x', category: 'AI', matcher: { kind: 'type', types: ['TEXT'] }, template: 'b' },
      ],
    });

    expect(() => parseRules(content, 'rules.json')).toThrow(/Duplicate rule id/);
  });

  it('should reject unknown matcher kinds', () => {
    const content = JSON.stringify({
      version: 1,
      rules: [{ id: 'x', category: 'AI', matcher: { kind: 'regex' }, template: 'a' }],
    });

    expect(() => parseRules(content, 'rules.json')).toThrow();
  });

  it('should ship the default rule set', () => {
    const rules = defaultRules();

    expect(rules.length).toBeGreaterThan(20);
    expect(new Set(rules.map(rule => rule.category))).toEqual(new Set(['FRONTEND', 'BACKEND', 'AI']));
  });
});

describe('deduplicate', () => {
  it('should number each category from 1', () => {
    const tasks = deduplicate([
      { category: 'AI', description: 'Train model', ruleId: 'a', nodeId: '1' },
      { category: 'BACKEND', description: 'Add API', ruleId: 'b', nodeId: '1' },
      { category: 'AI', description: 'train   MODEL ', ruleId: 'c', nodeId: '2' },
      { category: 'AI', description: 'Tune model', ruleId: 'd', nodeId: '2' },
    ]);

    expect(tasks.AI.map(task => [task.number, task.description])).toEqual([
      [1, 'Train model'],
      [2, 'Tune model'],
    ]);
    expect(tasks.AI[0]?.nodeIds).toEqual(['1', '2']);
    expect(tasks.BACKEND[0]?.number).toBe(1);
    expect(tasks.FRONTEND).toEqual([]);
  });
});
