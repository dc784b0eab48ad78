import { err, ok, Result } from 'neverthrow';
import { MalformedGrammarError } from './errors';
import type { RuleGroup } from './grammar';

/**
 * Reads the line oriented grammar notation:
 *
 *   E -> T EREST
 *   EREST -> + T EREST | ε
 *
 * One rule per line, symbols separated by whitespace, alternatives by `|`.
 * Blank lines and lines starting with `#` are skipped. The empty marker is
 * left as is; {@link buildGrammar} decides what it means.
 */
export function parseGrammarText(
  text: string
): Result<RuleGroup[], MalformedGrammarError> {
  const groups: RuleGroup[] = [];
  for (const [i, raw] of text.split(/\r?\n/).entries()) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }
    const arrow = line.indexOf('->');
    if (arrow === -1) {
      return err(new MalformedGrammarError(`expected "->" in "${line}"`, i + 1));
    }
    const head = line.slice(0, arrow).trim();
    if (head === '' || /\s/.test(head)) {
      return err(
        new MalformedGrammarError(
          `expected a single symbol before "->" in "${line}"`,
          i + 1
        )
      );
    }
    const alternatives = line
      .slice(arrow + 2)
      .split('|')
      .map((alternative) => alternative.split(/\s+/).filter((s) => s !== ''));
    groups.push({ head, alternatives });
  }
  return ok(groups);
}

/**
 * Splits an input sentence into tokens on whitespace.
 */
export function splitTokens(input: string): string[] {
  return input.split(/\s+/).filter((s) => s !== '');
}
