import { listClauses, type CatalogClause, type PlansFile } from '@tripguard/plan-catalog';

export interface ClauseMatch {
  clauseId: string;
  planCode: string;
  section: string;
  text: string;
  score: number;
}

export interface SearchOptions {
  planCode?: string;
  topK?: number;
}

interface IndexedClause {
  clause: CatalogClause;
  terms: Set<string>;
}

const STOPWORDS = new Set([
  'the',
  'and',
  'for',
  'are',
  'does',
  'what',
  'with',
  'when',
  'how',
  'much',
  'this',
  'that',
  'under',
  'any',
  'our',
  'your',
  'will',
  'can',
  'cover',
  'covered',
  'covers',
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9-]+/)
    .map((token) => token.replace(/^-+|-+$/g, ''))
    .filter((token) => token.length >= 3 && !STOPWORDS.has(token))
    .map((token) => (token.length > 4 && token.endsWith('s') ? token.slice(0, -1) : token));
}

function compareIds(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Keyword index over the policy clauses of the plan catalog. Scores are the
 * share of distinct query terms a clause contains.
 */
export class PolicyClauseIndex {
  private entries: IndexedClause[] = [];
  private builtAt: Date | null = null;

  constructor(private readonly loadCatalog: () => PlansFile) {}

  get size(): number {
    return this.entries.length;
  }

  get lastBuiltAt(): Date | null {
    return this.builtAt;
  }

  rebuild(): { status: 'indexed'; clausesIndexed: number } {
    const catalog = this.loadCatalog();
    this.entries = listClauses(catalog).map((clause) => ({
      clause,
      terms: new Set(tokenize(`${clause.section} ${clause.text} ${clause.tags.join(' ')}`)),
    }));
    this.builtAt = new Date();
    return { status: 'indexed', clausesIndexed: this.entries.length };
  }

  search(query: string, options: SearchOptions = {}): ClauseMatch[] {
    if (this.builtAt === null) {
      this.rebuild();
    }

    const queryTerms = [...new Set(tokenize(query))];
    if (queryTerms.length === 0) {
      return [];
    }

    const planCode = options.planCode?.trim().toUpperCase();
    const matches: ClauseMatch[] = [];
    for (const entry of this.entries) {
      if (planCode && entry.clause.planCode !== planCode) {
        continue;
      }
      const hits = queryTerms.filter((term) => entry.terms.has(term)).length;
      if (hits === 0) {
        continue;
      }
      matches.push({
        clauseId: entry.clause.clauseId,
        planCode: entry.clause.planCode,
        section: entry.clause.section,
        text: entry.clause.text,
        score: Math.round((hits / queryTerms.length) * 100) / 100,
      });
    }

    matches.sort((left, right) => right.score - left.score || compareIds(left.clauseId, right.clauseId));
    return matches.slice(0, options.topK ?? 4);
  }
}
