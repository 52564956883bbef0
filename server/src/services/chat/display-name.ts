import type { AuthorRoleDTO } from '@api';

const FIRST_NAMES = ['John', 'Jane', 'Alice', 'Bob', 'Eve'] as const;
const LAST_NAMES = ['Smith', 'Johnson', 'Williams', 'Jones', 'Brown'] as const;

const ROLE_DEFAULT_NAMES: Record<AuthorRoleDTO, string> = {
  ai_agent: 'AI Agent',
  human_agent: 'Human Agent',
  end_user: 'End User',
};

function pick<T>(items: readonly T[], random: () => number): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  const item = items[index];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty list');
  }
  return item;
}

/**
 * Random visitor name, e.g. "Alice Jones"
 */
export function generateVisitorName(random: () => number = Math.random): string {
  return `${pick(FIRST_NAMES, random)} ${pick(LAST_NAMES, random)}`;
}

/**
 * Bubble label: "<name or role default> (<author id or role>)"
 */
export function formatAuthorLabel(role: AuthorRoleDTO, name?: string | null, authorId?: string | null): string {
  return `${name || ROLE_DEFAULT_NAMES[role]} (${authorId || role})`;
}
