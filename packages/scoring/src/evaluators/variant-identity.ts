/**
 * Variant identity matching
 *
 * Compares rsIDs, star alleles and genotypes by meaning rather than
 * spelling: "4" matches "CYP2D6*4", "*3/*1" matches "CYP2C9*1/*3",
 * "AG" matches "G/A". Anything else falls back to fuzzy entity matching.
 */

import { toText } from '@annobench/core';
import type { AnnotationValue, EvaluatorOptions } from '@annobench/core';
import { fuzzyEntityMatch } from './text.js';

interface Allele {
  gene?: string;
  allele: string;
}

type VariantToken =
  | { kind: 'rsid'; id: string }
  | { kind: 'allele'; value: Allele }
  | { kind: 'genotype'; sides: Allele[] }
  | { kind: 'other'; text: string };

const LIST_SEPARATOR = /[,;]|\s+\+\s+|\s+and\s+/i;
const RSID = /^rs\d+$/;
const STAR_ALLELE = /^([a-z0-9-]*)\*(.+)$/;
const BARE_ALLELE = /^\d+[a-z]?(?:x\d+|xn)?$/;
const NUCLEOTIDES = /^(?:[acgt]+|del|ins|-)$/;
const COMPACT_GENOTYPE = /^[acgt]{2}$/;

function parseAllele(text: string, inheritedGene?: string): Allele | null {
  const star = STAR_ALLELE.exec(text);
  if (star) {
    return { gene: star[1] || inheritedGene, allele: star[2] ?? '' };
  }
  if (BARE_ALLELE.test(text) || NUCLEOTIDES.test(text)) {
    return { gene: inheritedGene, allele: text };
  }
  return null;
}

function parseToken(raw: string): VariantToken {
  const text = raw.toLowerCase().replace(/\s+/g, '');

  if (RSID.test(text)) {
    return { kind: 'rsid', id: text };
  }

  const sides = text.includes('/')
    ? text.split('/')
    : COMPACT_GENOTYPE.test(text)
      ? Array.from(text)
      : null;

  if (sides) {
    const parsed: Allele[] = [];
    let gene: string | undefined;
    for (const side of sides) {
      const allele = parseAllele(side, gene);
      if (!allele) return { kind: 'other', text };
      gene = allele.gene;
      parsed.push(allele);
    }
    parsed.sort((a, b) => (a.allele < b.allele ? -1 : a.allele > b.allele ? 1 : 0));
    return { kind: 'genotype', sides: parsed };
  }

  const allele = parseAllele(text);
  return allele ? { kind: 'allele', value: allele } : { kind: 'other', text };
}

function allelesRelated(a: Allele, b: Allele): boolean {
  if (a.allele !== b.allele) return false;
  return !a.gene || !b.gene || a.gene === b.gene;
}

function tokensRelated(a: VariantToken, b: VariantToken): boolean {
  switch (a.kind) {
    case 'rsid':
      return b.kind === 'rsid' && a.id === b.id;
    case 'allele':
      return b.kind === 'allele' && allelesRelated(a.value, b.value);
    case 'genotype': {
      if (b.kind !== 'genotype' || a.sides.length !== b.sides.length) return false;
      const otherSides = b.sides;
      return a.sides.every((side, i) => {
        const other = otherSides[i];
        return other !== undefined && allelesRelated(side, other);
      });
    }
    case 'other':
      return b.kind === 'other' && a.text === b.text;
  }
}

/**
 * Split a variant list ("rs1, rs2", "*1 + *2") into parsed tokens
 */
function parseVariantList(text: string): VariantToken[] {
  return text
    .split(LIST_SEPARATOR)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parseToken);
}

function listsRelated(predicted: VariantToken[], expected: VariantToken[]): boolean {
  if (predicted.length === 0 || expected.length === 0) return false;
  return (
    predicted.every((p) => expected.some((e) => tokensRelated(p, e))) &&
    expected.every((e) => predicted.some((p) => tokensRelated(p, e)))
  );
}

/**
 * variant_identity_match
 */
export function variantIdentityMatch(
  predicted: AnnotationValue,
  expected: AnnotationValue,
  options?: EvaluatorOptions
): number {
  const p = toText(predicted);
  const e = toText(expected);
  if (p === null || e === null) return p === e ? 1 : 0;

  if (listsRelated(parseVariantList(p), parseVariantList(e))) {
    return 1;
  }

  return fuzzyEntityMatch(p, e, options);
}
