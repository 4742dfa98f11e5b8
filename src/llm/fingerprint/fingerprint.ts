import crypto from "node:crypto";
import gazetteer from "./gazetteer.json";

/**
 * Deterministic text fingerprints built from seeded random projections.
 *
 * Every unigram and adjacent-word bigram of the normalized text seeds a 64-bit
 * linear congruential generator that spans all dimensions; the weighted sum of
 * those pseudo-random vectors is L2-normalized. Texts sharing tokens share
 * projection components, so lexical overlap shows up as cosine similarity.
 * Place names (states, abbreviations, major cities) weigh more so that
 * location-bearing queries favour location-bearing records.
 */

const LCG_MULTIPLIER = 6364136223846793005n;
const LCG_INCREMENT = 1442695040888963407n;
const HALF_RANGE = 1073741823;

export const UNIGRAM_WEIGHT = 1.0;
export const PLACE_UNIGRAM_WEIGHT = 2.0;
export const BIGRAM_WEIGHT = 1.0;
export const PLACE_BIGRAM_WEIGHT = 3.0;

const PLACE_TERMS: ReadonlySet<string> = new Set(gazetteer.unigrams);
const PLACE_BIGRAMS: ReadonlySet<string> = new Set(gazetteer.bigrams);

export interface WeightedToken {
    token: string;
    weight: number;
}

export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .trim()
        .replace(/[^a-z0-9\s.$%,]/g, " ")
        .replace(/\s+/g, " ")
        .trim();
}

export function isPlaceTerm(word: string): boolean {
    return PLACE_TERMS.has(word);
}

export function isPlaceBigram(first: string, second: string): boolean {
    return PLACE_BIGRAMS.has(`${first} ${second}`);
}

export function tokenize(text: string): WeightedToken[] {
    const normalized = normalizeText(text);
    if (!normalized) {
        return [];
    }

    const words = normalized.split(" ");
    const tokens: WeightedToken[] = words.map((word) => ({
        token: word,
        weight: isPlaceTerm(word) ? PLACE_UNIGRAM_WEIGHT : UNIGRAM_WEIGHT,
    }));

    for (let i = 0; i < words.length - 1; i += 1) {
        tokens.push({
            token: `${words[i]}_${words[i + 1]}`,
            weight: isPlaceBigram(words[i], words[i + 1]) ? PLACE_BIGRAM_WEIGHT : BIGRAM_WEIGHT,
        });
    }

    return tokens;
}

/** First 8 bytes of the token's SHA-256 digest, big-endian. */
export function tokenSeed(token: string): bigint {
    return crypto.createHash("sha256").update(token, "utf-8").digest().readBigUInt64BE(0);
}

function accumulate(vector: Float64Array, seed: bigint, weight: number): void {
    let state = seed;
    for (let d = 0; d < vector.length; d += 1) {
        state = BigInt.asUintN(64, state * LCG_MULTIPLIER + LCG_INCREMENT);
        const value = (Number(state >> 33n) - HALF_RANGE) / HALF_RANGE;
        vector[d] += value * weight;
    }
}

export function l2Normalize(vector: ArrayLike<number>): number[] {
    let sumOfSquares = 0;
    for (let i = 0; i < vector.length; i += 1) {
        sumOfSquares += vector[i] * vector[i];
    }

    const norm = Math.sqrt(sumOfSquares);
    const result = new Array<number>(vector.length);
    for (let i = 0; i < vector.length; i += 1) {
        result[i] = norm > 0 ? vector[i] / norm : 0;
    }
    return result;
}

export function fingerprint(text: string, dimension: number): number[] {
    if (!Number.isInteger(dimension) || dimension <= 0) {
        throw new Error(`Fingerprint dimension must be a positive integer, got: ${dimension}`);
    }

    const vector = new Float64Array(dimension);
    for (const { token, weight } of tokenize(text)) {
        accumulate(vector, tokenSeed(token), weight);
    }

    return l2Normalize(vector);
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
    if (a.length !== b.length) return 0;

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i += 1) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
    if (magnitude === 0) return 0;

    return dot / magnitude;
}
