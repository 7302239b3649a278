import { logger } from './application-logger';
import { Ternary } from './types';
import { isPlainObject } from './validation';

export type ConditionOperator = 'and' | 'or' | 'not';

const CONDITION_OPERATORS: readonly string[] = ['and', 'or', 'not'];

/**
 * Typed form of the nested condition lists found in the datafile. Built once when the
 * configuration is indexed; evaluation never looks at the raw lists again.
 */
export type ConditionTree<L> =
  | { readonly type: 'and'; readonly conditions: readonly ConditionTree<L>[] }
  | { readonly type: 'or'; readonly conditions: readonly ConditionTree<L>[] }
  | { readonly type: 'not'; readonly condition: ConditionTree<L> | null }
  | { readonly type: 'leaf'; readonly leaf: L };

export interface AttributeCondition {
  readonly name: string;
  readonly type: string;
  // Absent on legacy audiences, which only knew exact matching.
  readonly match?: string;
  readonly value: unknown;
}

function isOperator(value: unknown): value is ConditionOperator {
  return typeof value === 'string' && CONDITION_OPERATORS.includes(value);
}

/**
 * Converts a condition list into a tree. A list that does not start with an operator is an
 * implicit "or" over its entries, and "not" only looks at its first operand.
 */
export function parseConditionTree<L>(
  raw: unknown,
  parseLeaf: (raw: unknown) => L,
): ConditionTree<L> {
  if (!Array.isArray(raw)) {
    return { type: 'leaf', leaf: parseLeaf(raw) };
  }

  const [head, ...tail] = raw;
  const operator: ConditionOperator = isOperator(head) ? head : 'or';
  const operands: unknown[] = isOperator(head) ? tail : raw;
  const conditions = operands.map((operand) => parseConditionTree(operand, parseLeaf));

  switch (operator) {
    case 'and':
      return { type: 'and', conditions };
    case 'not':
      return { type: 'not', condition: conditions[0] ?? null };
    default:
      return { type: 'or', conditions };
  }
}

export function parseAttributeCondition(raw: unknown): AttributeCondition {
  if (!isPlainObject(raw) || typeof raw.name !== 'string') {
    logger.warn(`Ignoring malformed audience condition ${JSON.stringify(raw)}`);
    // An empty type never matches a known condition type, so the leaf evaluates to unknown.
    return { name: '', type: '', value: null };
  }
  return {
    name: raw.name,
    type: typeof raw.type === 'string' ? raw.type : '',
    match: typeof raw.match === 'string' ? raw.match : undefined,
    value: raw.value,
  };
}

export function parseAudienceReference(raw: unknown): string {
  return typeof raw === 'string' ? raw : String(raw);
}

/**
 * Evaluates a tree with Kleene logic. "and" stops at the first false child and "or" at the
 * first true child; otherwise an unknown child makes the whole node unknown.
 */
export function evaluateConditionTree<L>(
  tree: ConditionTree<L>,
  evaluateLeaf: (leaf: L) => Ternary,
): Ternary {
  switch (tree.type) {
    case 'and': {
      let sawUnknown = false;
      for (const condition of tree.conditions) {
        const result = evaluateConditionTree(condition, evaluateLeaf);
        if (result === false) {
          return false;
        }
        if (result === null) {
          sawUnknown = true;
        }
      }
      return sawUnknown ? null : true;
    }
    case 'or': {
      let sawUnknown = false;
      for (const condition of tree.conditions) {
        const result = evaluateConditionTree(condition, evaluateLeaf);
        if (result === true) {
          return true;
        }
        if (result === null) {
          sawUnknown = true;
        }
      }
      return sawUnknown ? null : false;
    }
    case 'not': {
      if (tree.condition === null) {
        return null;
      }
      const result = evaluateConditionTree(tree.condition, evaluateLeaf);
      return result === null ? null : !result;
    }
    case 'leaf':
      return evaluateLeaf(tree.leaf);
  }
}
