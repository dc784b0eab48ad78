import { buildGrammarOrThrow } from '../grammar';

/**
 * The classic expression grammar with left recursion already removed.
 */
// prettier-ignore
export const expressionGrammar = () =>
  buildGrammarOrThrow({
    E: [['T', 'EREST']],
    EREST: [['+', 'T', 'EREST'], ['ε']],
    T: [['F', 'TREST']],
    TREST: [['*', 'F', 'TREST'], ['ε']],
    F: [['(', 'E', ')'], ['num']],
  });
