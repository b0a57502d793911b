import {parse as parseSelector, stringify, SelectorType, AttributeAction} from 'css-what';
import {compile} from 'css-select';
import {Diagnostics} from './diagnostics.js';
import {defaultEnvironment} from './environment.js';
import {
  createStyle,
  createRootStyle,
  createAnonymousStyle,
  cascadeStyles,
  uaDeclaredStyles,
  EMPTY_STYLE
} from './style.js';
import {parseDeclaration, parsePropertyValue, isModeledProperty, valueText} from './style-parse.js';
import {parseDeclarationList} from './parse-css.js';

import type {Selector} from 'css-what';
import type {Value, Raw} from 'css-tree';
import type {Document, DocNode, HTMLElement} from './dom.js';
import type {Style, DeclaredStyle, ComputeContext} from './style.js';
import type {Environment} from './environment.js';

/**
 * (id, class/attribute/pseudo-class, type/pseudo-element)
 */
export type Specificity = readonly [number, number, number];

export interface Declaration {
  property: string;
  /** the value as written, without !important */
  value: string;
  important: boolean;
  /** the parsed value, undefined if the property isn't modeled or is invalid */
  style: DeclaredStyle | undefined;
}

export function createDeclaration(
  property: string,
  value: string | Value | Raw,
  important = false
): Declaration {
  property = property.trim();
  if (!property.startsWith('--')) property = property.toLowerCase();
  if (typeof value === 'string') {
    return {property, value: value.trim(), important, style: parsePropertyValue(property, value)};
  } else {
    return {property, value: valueText(value), important, style: parseDeclaration(property, value)};
  }
}

export function compareSpecificity(a: Specificity, b: Specificity) {
  return a[0] - b[0] || a[1] - b[1] || a[2] - b[2];
}

/**
 * Selectors Level 4 § 17
 */
export function specificity(selector: Selector[]): Specificity {
  let ids = 0;
  let classes = 0;
  let types = 0;

  for (const token of selector) {
    switch (token.type) {
      case SelectorType.Attribute:
        // css-what marks #foo (but not [id=foo]) with quirks case sensitivity
        if (
          token.name === 'id' &&
          token.action === AttributeAction.Equals &&
          String(token.ignoreCase) === 'quirks'
        ) {
          ids++;
        } else {
          classes++;
        }
        break;
      case SelectorType.Pseudo:
        if (Array.isArray(token.data)) {
          // :where() adds nothing, :is(), :not() and :has() add their most
          // specific argument
          if (token.name !== 'where') {
            let max: Specificity = [0, 0, 0];
            for (const argument of token.data) {
              const s = specificity(argument);
              if (compareSpecificity(s, max) > 0) max = s;
            }
            ids += max[0];
            classes += max[1];
            types += max[2];
          }
        } else {
          classes++;
        }
        break;
      case SelectorType.Tag:
      case SelectorType.PseudoElement:
        types++;
        break;
    }
  }

  return [ids, classes, types];
}

export class StyleRule {
  /** a single complex selector (no commas) */
  selectorText: string;
  selector: Selector[];
  declarations: Declaration[];
  specificity: Specificity;
  /** position of the rule in its stylesheet */
  order: number;

  constructor(selectorText: string, selector: Selector[], declarations: Declaration[], order: number) {
    this.selectorText = selectorText;
    this.selector = selector;
    this.declarations = declarations;
    this.specificity = specificity(selector);
    this.order = order;
  }
}

/**
 * Creates one StyleRule per selector in the comma-separated `selectorText`.
 * Returns nothing when the selector list can't be parsed; CSS drops the whole
 * rule in that case.
 */
export function createRules(
  selectorText: string,
  declarations: Declaration[],
  order: number,
  diagnostics?: Diagnostics
): StyleRule[] {
  let selectors: Selector[][];

  try {
    selectors = parseSelector(selectorText);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    diagnostics?.report('InvalidSelector', `"${selectorText.trim()}": ${reason}`);
    return [];
  }

  return selectors.map(selector => {
    return new StyleRule(stringify([selector]), selector, declarations, order);
  });
}

export class Stylesheet {
  rules: StyleRule[];

  constructor(rules: StyleRule[] = []) {
    this.rules = rules;
  }

  /**
   * Next free source order, for appending rules
   */
  get nextOrder() {
    let order = 0;
    for (const rule of this.rules) order = Math.max(order, rule.order + 1);
    return order;
  }

  concat(other: Stylesheet) {
    const offset = this.nextOrder;
    const rules = other.rules.map(rule => {
      return new StyleRule(rule.selectorText, rule.selector, rule.declarations, rule.order + offset);
    });
    return new Stylesheet(this.rules.concat(rules));
  }
}

/**
 * Computed styles of every node in a document, indexed by NodeId
 */
export type StyleTree = readonly Style[];

export interface ResolverOptions {
  viewport: {width: number, height: number};
  diagnostics?: Diagnostics;
  environment?: Readonly<Environment>;
}

interface CompiledRule {
  rule: StyleRule;
  test: (el: HTMLElement) => boolean;
}

export class StyleResolver {
  private doc: Document;
  private stylesheet: Stylesheet;
  private diagnostics: Diagnostics;
  private environment: Readonly<Environment>;
  private viewport: {width: number, height: number};
  private compiled: CompiledRule[] | undefined;

  constructor(doc: Document, stylesheet: Stylesheet, options: ResolverOptions) {
    this.doc = doc;
    this.stylesheet = stylesheet;
    this.viewport = options.viewport;
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    this.environment = options.environment ?? defaultEnvironment;
  }

  private compileRules() {
    if (this.compiled) return this.compiled;

    const compiled: CompiledRule[] = [];

    for (const rule of this.stylesheet.rules) {
      try {
        const test = compile<DocNode, HTMLElement>(rule.selectorText, {adapter: this.doc.adapter});
        compiled.push({rule, test});
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        this.diagnostics.report('InvalidSelector', `"${rule.selectorText}": ${reason}`);
      }
    }

    return this.compiled = compiled;
  }

  /**
   * Rules matching the element, lowest precedence first: by specificity, then
   * by source order
   */
  matchingRules(el: HTMLElement): StyleRule[] {
    const matched: StyleRule[] = [];
    for (const {rule, test} of this.compileRules()) {
      if (test(el)) matched.push(rule);
    }
    return matched.sort((a, b) => {
      return compareSpecificity(a.specificity, b.specificity) || a.order - b.order;
    });
  }

  /**
   * CSS Cascading 4 § 6: author normal < inline normal < author important <
   * inline important. The user agent origin goes underneath all of them.
   */
  cascade(el: HTMLElement) {
    const matched = this.matchingRules(el);
    const styleAttr = el.getAttribute('style');
    const inline = styleAttr ? parseDeclarationList(styleAttr, this.diagnostics) : [];
    const cascaded: DeclaredStyle = {};
    const extra = new Map<string, string>();

    const apply = (declaration: Declaration) => {
      if (!isModeledProperty(declaration.property)) {
        extra.set(declaration.property, declaration.value);
      } else if (declaration.style) {
        Object.assign(cascaded, declaration.style);
      } else {
        this.diagnostics.report(
          'ParseFallback',
          `ignored ${declaration.property}: ${declaration.value}`,
          el.id
        );
      }
    };

    for (const important of [false, true]) {
      for (const rule of matched) {
        for (const declaration of rule.declarations) {
          if (declaration.important === important) apply(declaration);
        }
      }

      for (const declaration of inline) {
        if (declaration.important === important) apply(declaration);
      }
    }

    const ua = uaDeclaredStyles[el.tagName] ?? EMPTY_STYLE;

    return {style: cascadeStyles(ua, cascaded), extra};
  }

  /**
   * Computed style for `node`. `ancestorChain` holds the computed styles of
   * its ancestors, root first.
   */
  resolve(node: DocNode, ancestorChain: readonly Style[]): Style {
    const parentStyle = ancestorChain.at(-1);
    const ctx: ComputeContext = {
      viewportWidth: this.viewport.width,
      viewportHeight: this.viewport.height,
      rootFontSize: ancestorChain[0]?.fontSize ?? this.environment.defaultFontSize
    };

    if (!node.isElement()) {
      if (!parentStyle) throw new Error('Assertion failed');
      return createAnonymousStyle(parentStyle, ctx);
    }

    const {style, extra} = this.cascade(node);

    if (parentStyle) return createStyle(parentStyle, style, ctx, extra);

    return createRootStyle({fontSize: this.environment.defaultFontSize, ...style}, ctx, extra);
  }
}

/**
 * Resolves every node of the document in document order
 */
export function resolveStyles(
  doc: Document,
  stylesheet: Stylesheet,
  options: ResolverOptions
): StyleTree {
  const resolver = new StyleResolver(doc, stylesheet, options);
  const styles: Style[] = [];
  const stack: {node: DocNode, ancestors: readonly Style[]}[] = [{node: doc.root, ancestors: []}];

  while (stack.length) {
    const entry = stack.pop();
    if (!entry) break;
    const {node, ancestors} = entry;
    const style = resolver.resolve(node, ancestors);
    styles[node.id] = style;
    if (node.isElement()) {
      const childAncestors = ancestors.concat(style);
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({node: doc.node(node.children[i]), ancestors: childAncestors});
      }
    }
  }

  return styles;
}
