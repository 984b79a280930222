import { Analyser } from './analyser';

export interface AnalyserRule {
  readonly pattern: RegExp;
  readonly caseInsensitive: boolean;
  readonly analyser: Analyser;
}

/**
 * Ordered table of key patterns.
 *
 * A pattern matches when it matches at the start of the key; it does not have to
 * consume the whole key, so `images/` matches `images/a.png`. Every matching rule
 * applies, in registration order.
 */
export class Router {
  private rules: AnalyserRule[] = [];

  register(analyser: Analyser, pattern: string, caseInsensitive = true): void {
    const compiled = new RegExp(`^(?:${pattern})`, caseInsensitive ? 'i' : '');
    this.rules.push({ pattern: compiled, caseInsensitive, analyser });
  }

  resolve(key: string): Analyser[] {
    return this.rules.filter((rule) => rule.pattern.test(key)).map((rule) => rule.analyser);
  }

  /**
   * Distinct analysers in registration order
   */
  analysers(): Analyser[] {
    return [...new Set(this.rules.map((rule) => rule.analyser))];
  }

  get size(): number {
    return this.rules.length;
  }
}
