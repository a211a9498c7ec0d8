/**
 * Name Matchers
 *
 * Decide whether two printed names belong to the same person. The exact
 * token-set rule is the default; the model-assisted matcher only consults
 * the model after that rule has failed, and only when configured.
 */

import type { NameMatcherKind } from '../config';
import { MalformedResponse, absorb, err, ok, type Result } from '../errors';
import { callModel, type ModelGateway } from '../gateway/model-gateway';
import { parseJsonObject } from '../extractors/response-parser';
import { buildNameMatchPrompt } from '../templates/name-match.template';

export interface NameMatcher {
  readonly kind: NameMatcherKind;
  matches(a: string | null | undefined, b: string | null | undefined): Promise<boolean>;
}

/**
 * Lowercase ASCII tokens with diacritics stripped: "José  DOE-Smith" -> ["jose", "doe", "smith"].
 */
export function normalizeNameTokens(name: string | null | undefined): string[] {
  if (!name) {
    return [];
  }

  const folded = name
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^a-z\s]/g, ' ');

  return folded.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Same set of tokens, ignoring order and repeats. Two empty names never match.
 */
export function tokenSetsMatch(a: string | null | undefined, b: string | null | undefined): boolean {
  const left = new Set(normalizeNameTokens(a));
  const right = new Set(normalizeNameTokens(b));

  if (left.size === 0 || right.size === 0 || left.size !== right.size) {
    return false;
  }
  return [...left].every((token) => right.has(token));
}

export class ExactTokenSetMatcher implements NameMatcher {
  readonly kind = 'exact' as const;

  async matches(a: string | null | undefined, b: string | null | undefined): Promise<boolean> {
    return tokenSetsMatch(a, b);
  }
}

function readVerdict(text: string): Result<boolean> {
  const parsed = parseJsonObject(text);
  if (!parsed.ok) {
    return parsed;
  }

  const samePerson = parsed.value.same_person;
  if (typeof samePerson !== 'boolean') {
    return err(new MalformedResponse('Name match reply has no boolean same_person', text));
  }
  return ok(samePerson);
}

export class ModelAssistedMatcher implements NameMatcher {
  readonly kind = 'model_assisted' as const;

  constructor(
    private readonly gateway: ModelGateway,
    private readonly rule: NameMatcher = new ExactTokenSetMatcher()
  ) {}

  async matches(a: string | null | undefined, b: string | null | undefined): Promise<boolean> {
    const ruleResult = await this.rule.matches(a, b);
    if (ruleResult || !a?.trim() || !b?.trim()) {
      return ruleResult;
    }

    const prompt = buildNameMatchPrompt(a, b);
    const reply = await callModel('complete', () => this.gateway.complete(prompt));
    const verdict: Result<boolean> = reply.ok ? readVerdict(reply.value) : reply;

    return absorb(verdict, ruleResult, 'name_matching');
  }
}

export function createNameMatcher(kind: NameMatcherKind, gateway: ModelGateway): NameMatcher {
  return kind === 'model_assisted' ? new ModelAssistedMatcher(gateway) : new ExactTokenSetMatcher();
}
