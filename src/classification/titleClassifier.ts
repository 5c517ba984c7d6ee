/**
 * TitleClassifier: rank taxonomy categories for a job title
 *
 * Two independent rankers score every category: lexical (token-set ratio
 * against the category label) and semantic (embedding cosine). The top
 * RANKER_TOP_K of each are merged; a candidate found by only one ranker gets
 * its other score computed on demand. Candidates are ordered by the higher of
 * the two scores, ties broken by category code, and the best
 * CLASSIFIER_TOP_N are returned.
 */

import type {
  EmbeddingProvider,
  RankerScore,
  Taxonomy,
  TaxonomyEntry,
  TitleCandidate,
} from "@/types";
import { CLASSIFIER_TOP_N, NO_INFO_SENTINEL, RANKER_TOP_K } from "@/constants";
import { tokenSetRatio } from "./lexicalSimilarity";
import { semanticScore } from "./semanticSimilarity";

export type TitleClassifierOptions = {
  topK?: number;
  topN?: number;
};

/**
 * Highest scores first; equal scores by code ascending
 */
function compareScores(a: RankerScore, b: RankerScore): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.code < b.code ? -1 : a.code > b.code ? 1 : 0;
}

export class TitleClassifier {
  private readonly entriesByCode: Map<string, TaxonomyEntry>;

  private constructor(
    private readonly taxonomy: Taxonomy,
    private readonly provider: EmbeddingProvider,
    private readonly labelEmbeddings: Map<string, number[]>,
    private readonly topK: number,
    private readonly topN: number,
  ) {
    this.entriesByCode = new Map(taxonomy.entries.map((entry) => [entry.code, entry]));
  }

  /**
   * Build a classifier, embedding every category label once
   */
  static async create(
    taxonomy: Taxonomy,
    provider: EmbeddingProvider,
    options?: TitleClassifierOptions,
  ): Promise<TitleClassifier> {
    const vectors = await provider.embed(taxonomy.entries.map((entry) => entry.label));
    if (vectors.length !== taxonomy.entries.length) {
      throw new Error(
        `Embedding provider "${provider.name}" returned ${vectors.length} vectors for ${taxonomy.entries.length} labels`,
      );
    }

    const labelEmbeddings = new Map<string, number[]>();
    taxonomy.entries.forEach((entry, i) => labelEmbeddings.set(entry.code, vectors[i]));

    return new TitleClassifier(
      taxonomy,
      provider,
      labelEmbeddings,
      options?.topK ?? RANKER_TOP_K,
      options?.topN ?? CLASSIFIER_TOP_N,
    );
  }

  get taxonomyVersion(): string {
    return this.taxonomy.version;
  }

  private lexicalScores(title: string): RankerScore[] {
    return this.taxonomy.entries.map((entry) => ({
      code: entry.code,
      score: tokenSetRatio(title, entry.label),
    }));
  }

  private semanticScores(titleVector: number[]): RankerScore[] {
    return this.taxonomy.entries.map((entry) => ({
      code: entry.code,
      score: semanticScore(titleVector, this.labelEmbedding(entry.code)),
    }));
  }

  private labelEmbedding(code: string): number[] {
    const vector = this.labelEmbeddings.get(code);
    if (!vector) {
      throw new Error(`No embedding for category "${code}"`);
    }
    return vector;
  }

  private entry(code: string): TaxonomyEntry {
    const entry = this.entriesByCode.get(code);
    if (!entry) {
      throw new Error(`Unknown category "${code}"`);
    }
    return entry;
  }

  /**
   * Top candidates for a cleaned job title
   *
   * Returns [] for an empty title or the no-information sentinel.
   */
  async classify(title: string): Promise<TitleCandidate[]> {
    const query = title.trim();
    if (query.length === 0 || query === NO_INFO_SENTINEL) {
      return [];
    }

    const [titleVector] = await this.provider.embed([query]);
    if (!titleVector) {
      throw new Error(`Embedding provider "${this.provider.name}" returned no vector`);
    }

    const lexicalTop = this.lexicalScores(query).sort(compareScores).slice(0, this.topK);
    const semanticTop = this.semanticScores(titleVector)
      .sort(compareScores)
      .slice(0, this.topK);

    const lexical = new Map(lexicalTop.map((s) => [s.code, s.score]));
    const semantic = new Map(semanticTop.map((s) => [s.code, s.score]));
    const codes = new Set([...lexical.keys(), ...semantic.keys()]);

    const merged = [...codes].map((code) => {
      const entry = this.entry(code);
      const lexicalScore = lexical.get(code) ?? tokenSetRatio(query, entry.label);
      const semanticScoreValue =
        semantic.get(code) ?? semanticScore(titleVector, this.labelEmbedding(code));
      return {
        entry,
        lexicalScore,
        semanticScore: semanticScoreValue,
        combinedScore: Math.max(lexicalScore, semanticScoreValue),
      };
    });

    merged.sort((a, b) =>
      compareScores(
        { code: a.entry.code, score: a.combinedScore },
        { code: b.entry.code, score: b.combinedScore },
      ),
    );

    return merged.slice(0, this.topN).map((candidate, i) => ({
      categoryCode: candidate.entry.code,
      categoryLabel: candidate.entry.label,
      semanticScore: candidate.semanticScore,
      lexicalScore: candidate.lexicalScore,
      combinedScore: candidate.combinedScore,
      rank: i + 1,
    }));
  }
}
