import reservedWords from '../data/reserved-words.json';

// generated data-access code is C#, so its keywords are off limits for property names
const RESERVED = new Set<string>(reservedWords);

const SYMBOLIC_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isReservedWord(name: string): boolean {
  return RESERVED.has(name);
}

/** Letters, digits and underscore, not starting with a digit. Used for enum keys. */
export function isSymbolicName(name: string): boolean {
  return SYMBOLIC_NAME.test(name);
}

export type IdentifierProblem = 'empty' | 'illegal-characters' | 'reserved-word';

export function identifierProblem(name: string): IdentifierProblem | undefined {
  if (!name) return 'empty';
  if (!isSymbolicName(name)) return 'illegal-characters';
  if (isReservedWord(name)) return 'reserved-word';
  return undefined;
}

export function isIdentifier(name: string): boolean {
  return identifierProblem(name) === undefined;
}
