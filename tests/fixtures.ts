/**
 * Shared raw-document builders for tests
 */

export interface RawNode {
  id: string;
  type: string;
  name?: string;
  children?: unknown[];
  [key: string]: unknown;
}

export function raw(
  id: string,
  type: string,
  name: string,
  children?: unknown[],
  extra: Record<string, unknown> = {}
): RawNode {
  return { id, type, name, ...(children ? { children } : {}), ...extra };
}

/**
 * Document
 * ├── Login Page (FRAME)
 * │   ├── Email (TEXT)
 * │   ├── Password (TEXT)
 * │   └── Submit Button (FRAME)
 * └── Dashboard (FRAME)
 *     └── Team List (GROUP)
 *         ├── Member 1 (FRAME)
 *         ├── Member 2 (FRAME)
 *         └── Member 3 (FRAME)
 */
export function loginDashboardDocument(): RawNode {
  return raw('0:0', 'DOCUMENT', 'Document', [
    raw('1:1', 'FRAME', 'Login Page', [
      raw('1:2', 'TEXT', 'Email', undefined, { characters: 'you@example.com' }),
      raw('1:3', 'TEXT', 'Password'),
      raw('1:4', 'FRAME', 'Submit Button'),
    ]),
    raw('2:1', 'FRAME', 'Dashboard', [
      raw('2:2', 'GROUP', 'Team List', [
        raw('2:3', 'FRAME', 'Member 1'),
        raw('2:4', 'FRAME', 'Member 2'),
        raw('2:5', 'FRAME', 'Member 3'),
      ]),
    ]),
  ]);
}
