import {parse, generate} from 'css-tree';
import {Diagnostics} from './diagnostics.js';
import {Stylesheet, createRules, createDeclaration} from './cascade.js';

import type {CssNode, Block} from 'css-tree';
import type {Declaration, StyleRule} from './cascade.js';

// Conditional group rules whose contents are always applied. Conditions are
// not evaluated.
const groupingAtRules = new Set(['media', 'supports', 'layer', 'container']);

function declarationsOf(block: Block): Declaration[] {
  const declarations: Declaration[] = [];
  for (const node of block.children.toArray()) {
    if (node.type === 'Declaration') {
      declarations.push(createDeclaration(node.property, node.value, Boolean(node.important)));
    }
  }
  return declarations;
}

/**
 * Parses stylesheet text. Never throws: unparseable parts are skipped the way
 * CSS Syntax 3 § 5 says, and unparseable selectors drop their rule with an
 * InvalidSelector diagnostic.
 */
export function parseStylesheet(text: string, diagnostics = new Diagnostics()): Stylesheet {
  const ast = parse(text, {
    parseRulePrelude: false,
    parseAtrulePrelude: false,
    positions: false,
    onParseError(error) {
      diagnostics.report('ParseFallback', `skipped unparseable CSS: ${error.message}`);
    }
  });

  const rules: StyleRule[] = [];
  let order = 0;

  const visit = (nodes: CssNode[]) => {
    for (const node of nodes) {
      if (node.type === 'Rule') {
        const selectorText = node.prelude.type === 'Raw'
          ? node.prelude.value
          : generate(node.prelude);
        const declarations = declarationsOf(node.block);
        for (const rule of createRules(selectorText, declarations, order, diagnostics)) {
          rules.push(rule);
        }
        order++;
      } else if (node.type === 'Atrule' && groupingAtRules.has(node.name.toLowerCase())) {
        if (node.block) visit(node.block.children.toArray());
      }
    }
  };

  if (ast.type === 'StyleSheet') visit(ast.children.toArray());

  return new Stylesheet(rules);
}

/**
 * Parses the contents of a style attribute
 */
export function parseDeclarationList(text: string, diagnostics = new Diagnostics()): Declaration[] {
  const ast = parse(text, {
    context: 'declarationList',
    positions: false,
    onParseError(error) {
      diagnostics.report('ParseFallback', `skipped unparseable declaration: ${error.message}`);
    }
  });

  const declarations: Declaration[] = [];

  if (ast.type === 'DeclarationList') {
    for (const node of ast.children.toArray()) {
      if (node.type === 'Declaration') {
        declarations.push(createDeclaration(node.property, node.value, Boolean(node.important)));
      }
    }
  }

  return declarations;
}
