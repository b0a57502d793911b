import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {parseStylesheet, parseDeclarationList} from '../src/parse-css.js';
import {createRules} from '../src/cascade.js';
import {Diagnostics} from '../src/diagnostics.js';

describe('parseStylesheet', function () {
  it('makes one rule per selector, sharing source order', function () {
    const sheet = parseStylesheet('p { color: red } .x, #y { color: blue }');
    assert.equal(sheet.rules.length, 3);
    assert.deepEqual(sheet.rules.map(rule => rule.order), [0, 1, 1]);
    assert.deepEqual(sheet.rules.map(rule => rule.specificity), [[0, 0, 1], [0, 1, 0], [1, 0, 0]]);
    assert.equal(sheet.nextOrder, 2);
  });

  it('records declarations with importance', function () {
    const [rule] = parseStylesheet('p { color: red !important; margin: 0 }').rules;
    assert.equal(rule.declarations.length, 2);
    assert.equal(rule.declarations[0].property, 'color');
    assert.equal(rule.declarations[0].important, true);
    assert.deepEqual(rule.declarations[0].style, {color: {r: 255, g: 0, b: 0, a: 1}});
    assert.equal(rule.declarations[1].important, false);
  });

  it('keeps unmodeled declarations without a parsed style', function () {
    const [rule] = parseStylesheet('p { grid-area: main; --gap: 4px }').rules;
    assert.deepEqual(rule.declarations.map(d => d.property), ['grid-area', '--gap']);
    assert.deepEqual(rule.declarations.map(d => d.style), [undefined, undefined]);
    assert.equal(rule.declarations[0].value, 'main');
    assert.equal(rule.declarations[1].value, '4px');
  });

  it('applies the contents of @media unconditionally', function () {
    const sheet = parseStylesheet('@media print { p { color: red } } div { color: blue }');
    assert.equal(sheet.rules.length, 2);
    assert.deepEqual(sheet.rules.map(rule => rule.order), [0, 1]);
  });

  it('ignores at-rules it does not group', function () {
    const sheet = parseStylesheet('@font-face { font-family: x } p { color: red }');
    assert.equal(sheet.rules.length, 1);
    assert.equal(sheet.rules[0].order, 0);
  });

  it('concatenates sheets so the second one comes later', function () {
    const a = parseStylesheet('p { color: red } div { color: red }');
    const b = parseStylesheet('p { color: blue }');
    const both = a.concat(b);
    assert.deepEqual(both.rules.map(rule => rule.order), [0, 1, 2]);
    assert.deepEqual(b.rules.map(rule => rule.order), [0]);
  });
});

describe('createRules', function () {
  it('reports and drops an unparseable selector list', function () {
    const diagnostics = new Diagnostics();
    assert.deepEqual(createRules(',', [], 0, diagnostics), []);
    const [diagnostic] = diagnostics.toArray();
    assert.equal(diagnostic.kind, 'InvalidSelector');
    assert.match(diagnostic.message, /^",": /);
  });
});

describe('parseDeclarationList', function () {
  it('parses a style attribute', function () {
    const declarations = parseDeclarationList('color: blue; width: 10px');
    assert.deepEqual(declarations.map(d => d.style), [
      {color: {r: 0, g: 0, b: 255, a: 1}},
      {width: 10}
    ]);
  });

  it('gives an invalid value an undefined style', function () {
    const [declaration] = parseDeclarationList('width: banana');
    assert.equal(declaration.property, 'width');
    assert.equal(declaration.value, 'banana');
    assert.equal(declaration.style, undefined);
  });
});
