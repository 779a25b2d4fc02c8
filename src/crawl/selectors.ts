import { CheerioAPI, load } from "cheerio";
import { Element, isTag } from "domhandler";

export interface SelectorMatcher {
  readonly selector: string;
  match(document: CheerioAPI): Element[];
}

export class CssSelectorMatcher implements SelectorMatcher {
  readonly selector: string;

  constructor(selector: string) {
    this.selector = selector;
  }

  match(document: CheerioAPI): Element[] {
    return document(this.selector).toArray().filter(isTag);
  }
}

export function createMatchers(selectors: string[]): SelectorMatcher[] {
  return selectors.map((selector) => new CssSelectorMatcher(selector));
}

/** Every matcher contributes; results keep matcher order, then document order. */
export function matchUnion(document: CheerioAPI, matchers: SelectorMatcher[]): Element[] {
  const matches: Element[] = [];
  for (const matcher of matchers) {
    matches.push(...matcher.match(document));
  }
  return matches;
}

/** Result of the first matcher that finds anything; later matchers are not run. */
export function matchFirst(document: CheerioAPI, matchers: SelectorMatcher[]): Element[] {
  for (const matcher of matchers) {
    const matches = matcher.match(document);
    if (matches.length > 0) {
      return matches;
    }
  }
  return [];
}

const probeDocument = load("<html><body></body></html>");

export function isValidSelector(selector: string): boolean {
  if (selector.trim().length === 0) {
    return false;
  }
  try {
    probeDocument(selector);
    return true;
  } catch {
    return false;
  }
}
