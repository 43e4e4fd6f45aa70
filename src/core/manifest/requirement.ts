import { compareVersions } from './semver';
import type { BoundClause, NormalizedRequirement, RequirementKind, RequirementOp, SemverVersion } from './types';

export type RequirementParse =
  | { ok: true; requirement: NormalizedRequirement }
  | { ok: false; reason: 'unparsable_requirement'; message: string };

type TokenType = 'word' | 'dot' | 'hyphen' | 'plus' | 'star' | 'comma' | 'op';

interface Token {
  type: TokenType;
  value: string;
  pos: number;
  /** Whitespace precedes this token. */
  spaced: boolean;
}

class RequirementSyntaxError extends Error {}

const OPERATORS: ReadonlyArray<[string, RequirementOp]> = [
  ['>=', 'greater-eq'],
  ['<=', 'less-eq'],
  ['>', 'greater'],
  ['<', 'less'],
  ['=', 'exact'],
  ['~', 'tilde'],
  ['^', 'caret'],
];

const PUNCTUATION: Record<string, TokenType> = {
  '.': 'dot',
  '-': 'hyphen',
  '+': 'plus',
  '*': 'star',
  ',': 'comma',
};

function tokenize(raw: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let spaced = false;
  while (i < raw.length) {
    const ch = raw[i] ?? '';
    if (/\s/.test(ch)) {
      spaced = true;
      i++;
      continue;
    }
    const op = OPERATORS.find(([text]) => raw.startsWith(text, i));
    const punctuation: TokenType | undefined = PUNCTUATION[ch];
    if (op) {
      tokens.push({ type: 'op', value: op[0], pos: i, spaced });
      i += op[0].length;
    } else if (punctuation) {
      tokens.push({ type: punctuation, value: ch, pos: i, spaced });
      i++;
    } else if (/[0-9A-Za-z]/.test(ch)) {
      const start = i;
      while (i < raw.length && /[0-9A-Za-z]/.test(raw[i] ?? '')) i++;
      tokens.push({ type: 'word', value: raw.slice(start, i), pos: start, spaced });
    } else {
      throw new RequirementSyntaxError(`unexpected character \`${ch}\` at position ${i}`);
    }
    spaced = false;
  }
  return tokens;
}

function isWildcardWord(token: Token | undefined): boolean {
  return token?.type === 'word' && (token.value === 'x' || token.value === 'X');
}

class RequirementParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): BoundClause[] {
    if (this.tokens.length === 0) throw new RequirementSyntaxError('empty version requirement');
    const clauses = [this.clause()];
    while (this.peek()?.type === 'comma') {
      this.pos++;
      clauses.push(this.clause());
    }
    const rest = this.peek();
    if (rest) throw new RequirementSyntaxError(`unexpected \`${rest.value}\` at position ${rest.pos}`);
    return clauses;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(what: string): Token {
    const token = this.tokens[this.pos];
    if (!token) throw new RequirementSyntaxError(`expected ${what} but the requirement ended`);
    this.pos++;
    return token;
  }

  /** Peeks a token that must be glued to the previous one. */
  private peekAttached(type: TokenType): boolean {
    const token = this.peek();
    return token !== undefined && token.type === type && !token.spaced;
  }

  private clause(): BoundClause {
    const opToken = this.peek()?.type === 'op' ? this.next('operator') : null;
    const op = opToken ? OPERATORS.find(([text]) => text === opToken.value)?.[1] ?? null : null;

    const head = this.peek();
    if (head?.type === 'star' || isWildcardWord(head)) {
      this.pos++;
      if (op) throw new RequirementSyntaxError('a wildcard cannot follow a comparison operator');
      this.trailingWildcards();
      return { op: 'wildcard', major: null, minor: null, patch: null, pre: [] };
    }

    const major = this.number('major version');
    let minor: number | null = null;
    let patch: number | null = null;
    let wildcard = false;

    if (this.peekAttached('dot')) {
      this.pos++;
      if (this.wildcardSegment()) {
        wildcard = true;
      } else {
        minor = this.number('minor version');
        if (this.peekAttached('dot')) {
          this.pos++;
          if (this.wildcardSegment()) wildcard = true;
          else patch = this.number('patch version');
        }
      }
    }

    if (wildcard) {
      if (op) throw new RequirementSyntaxError('a wildcard cannot follow a comparison operator');
      this.trailingWildcards();
      return { op: 'wildcard', major, minor, patch: null, pre: [] };
    }

    let pre: string[] = [];
    if (this.peekAttached('hyphen')) {
      if (patch === null) throw new RequirementSyntaxError('a pre-release needs a full major.minor.patch version');
      this.pos++;
      pre = this.identifiers('pre-release', true);
    }
    if (this.peekAttached('plus')) {
      this.pos++;
      this.identifiers('build metadata', false);
    }
    if (this.peekAttached('dot')) {
      const extra = this.next('segment');
      throw new RequirementSyntaxError(`unexpected \`${extra.value}\` at position ${extra.pos}`);
    }

    return { op: op ?? 'caret', major, minor, patch, pre };
  }

  private wildcardSegment(): boolean {
    const token = this.peek();
    if (token && !token.spaced && (token.type === 'star' || isWildcardWord(token))) {
      this.pos++;
      return true;
    }
    return false;
  }

  private trailingWildcards(): void {
    while (this.peekAttached('dot')) {
      this.pos++;
      if (!this.wildcardSegment()) {
        const token = this.peek();
        throw new RequirementSyntaxError(
          token ? `unexpected \`${token.value}\` after a wildcard at position ${token.pos}` : 'requirement ended after a wildcard separator'
        );
      }
    }
  }

  private number(what: string): number {
    const token = this.next(what);
    if (token.type !== 'word' || !/^\d+$/.test(token.value)) {
      throw new RequirementSyntaxError(`expected ${what} at position ${token.pos}, found \`${token.value}\``);
    }
    if (token.value.length > 1 && token.value.startsWith('0')) {
      throw new RequirementSyntaxError(`${what} \`${token.value}\` has a leading zero`);
    }
    const value = Number(token.value);
    if (!Number.isSafeInteger(value)) throw new RequirementSyntaxError(`${what} \`${token.value}\` is too large`);
    return value;
  }

  /** Dot-separated identifiers; hyphens are part of an identifier. */
  private identifiers(what: string, strictNumeric: boolean): string[] {
    const out: string[] = [];
    for (;;) {
      let ident = '';
      while (this.peekAttached('word') || this.peekAttached('hyphen')) {
        ident += this.next(what).value;
      }
      if (!ident) throw new RequirementSyntaxError(`empty ${what} identifier`);
      if (strictNumeric && /^\d+$/.test(ident) && ident.length > 1 && ident.startsWith('0')) {
        throw new RequirementSyntaxError(`${what} identifier \`${ident}\` has a leading zero`);
      }
      out.push(ident);
      if (!this.peekAttached('dot')) return out;
      this.pos++;
    }
  }
}

function requirementKind(clauses: BoundClause[]): RequirementKind {
  const first = clauses[0];
  if (clauses.length !== 1 || !first) return 'range';
  switch (first.op) {
    case 'exact':
      return 'exact';
    case 'caret':
      return 'caret';
    case 'tilde':
      return 'tilde';
    case 'wildcard':
      return 'wildcard';
    default:
      return 'range';
  }
}

/** Lowest version a single clause admits, or null for upper-bound-only clauses. */
export function clauseFloor(clause: BoundClause): SemverVersion | null {
  const major = clause.major ?? 0;
  const minor = clause.minor ?? 0;
  const patch = clause.patch ?? 0;
  switch (clause.op) {
    case 'less':
    case 'less-eq':
      return null;
    case 'greater':
      if (clause.pre.length > 0) return { major, minor, patch, pre: clause.pre };
      if (clause.patch !== null) return { major, minor, patch: patch + 1, pre: [] };
      if (clause.minor !== null) return { major, minor: minor + 1, patch: 0, pre: [] };
      return { major: major + 1, minor: 0, patch: 0, pre: [] };
    default:
      return { major, minor, patch, pre: clause.pre };
  }
}

export function requirementFloor(clauses: BoundClause[]): SemverVersion {
  let floor: SemverVersion = { major: 0, minor: 0, patch: 0, pre: [] };
  let bounded = false;
  for (const clause of clauses) {
    const f = clauseFloor(clause);
    if (!f) continue;
    if (!bounded || compareVersions(f, floor) > 0) floor = f;
    bounded = true;
  }
  return floor;
}

export function normalizeRequirement(raw: string): RequirementParse {
  try {
    const clauses = new RequirementParser(tokenize(raw)).parse();
    return {
      ok: true,
      requirement: {
        raw,
        kind: requirementKind(clauses),
        clauses,
        floor: requirementFloor(clauses),
      },
    };
  } catch (e) {
    if (e instanceof RequirementSyntaxError) {
      return { ok: false, reason: 'unparsable_requirement', message: `invalid version requirement \`${raw}\`: ${e.message}` };
    }
    throw e;
  }
}
