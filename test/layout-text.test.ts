import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {h} from '../src/dom.js';
import {blockOf, el, ifcOf, inlineOf, render} from './util.js';

import type {ElementDescription} from '../src/dom.js';

function paragraph(root: ElementDescription, css = '', width = 100) {
  const result = render(root, css, {width, height: 100});
  const ifc = ifcOf(result.layout);
  return {...result, ifc, lines: ifc.paragraph.lineboxes};
}

describe('whitespace collapsing', function () {
  it('collapses runs of spaces, tabs and newlines', function () {
    const {ifc, lines} = paragraph(h('div', '  a \t \n  b  '));
    assert.equal(ifc.text, ' a b ');
    assert.equal(lines.length, 1);
    assert.equal(lines[0].text(), 'a b');
    assert.equal(lines[0].width, 20);
  });

  it('collapses across inline boundaries and fixes up their offsets', function () {
    const {document, layout, ifc} = paragraph(h('div', ['a ', h('span', ' b')]));
    const span = inlineOf(layout, el(document, 'span'));
    assert.equal(ifc.text, 'a b');
    assert.equal(span.start, 2);
    assert.equal(span.end, 3);
  });

  it('keeps spaces under white-space: pre', function () {
    const {ifc, lines} = paragraph(h('div', 'a  b'), 'div { white-space: pre }');
    assert.equal(ifc.text, 'a  b');
    assert.equal(lines.length, 1);
    assert.equal(lines[0].width, 24);
  });

  it('keeps only newlines under white-space: pre-line', function () {
    const {ifc, lines} = paragraph(h('div', 'a  \n  b'), 'div { white-space: pre-line }');
    assert.equal(ifc.text, 'a\nb');
    assert.deepEqual(lines.map(line => line.text()), ['a', 'b']);
    assert.equal(lines[0].endsWithBreak, true);
  });
});

describe('line breaking', function () {
  it('wraps at spaces and drops the space at the wrap', function () {
    const {lines} = paragraph(h('div', 'aaaa bbbb cccc'), '', 80);
    assert.deepEqual(lines.map(line => line.text()), ['aaaa bbbb', 'cccc']);
    assert.deepEqual(lines.map(line => line.width), [68, 32]);
    assert.deepEqual(lines.map(line => line.y), [0, 20]);
  });

  it('puts a word wider than the line on a line of its own', function () {
    const {lines, layout} = paragraph(h('div', `a ${'b'.repeat(16)} c`));
    assert.deepEqual(lines.map(line => line.text()), ['a', 'b'.repeat(16), 'c']);
    assert.equal(lines[1].width, 128);
    assert.equal(layout.contentArea.height, 60);
  });

  it('carries an inline end edge after a space over to the next line when it overflows', function () {
    const {lines} = paragraph(
      h('div', [h('span', 'aaaa bbbb '), 'cccc']),
      'span { padding-right: 40px }',
      80
    );
    assert.deepEqual(lines.map(line => line.text()), ['aaaa bbbb', 'cccc']);
    assert.deepEqual(lines.map(line => line.width), [68, 72]);
  });

  it('does not wrap under white-space: nowrap', function () {
    const {lines} = paragraph(h('div', 'aaaa bbbb'), 'div { white-space: nowrap }', 50);
    assert.equal(lines.length, 1);
    assert.equal(lines[0].width, 68);
  });

  it('breaks at <br>', function () {
    const {lines} = paragraph(h('div', ['one', h('br'), 'two']));
    assert.deepEqual(lines.map(line => line.text()), ['one', 'two']);
    assert.deepEqual(lines.map(line => line.endsWithBreak), [true, false]);
  });

  it('treats text across elements without spaces as one word', function () {
    const {lines} = paragraph(h('div', ['aaa', h('span', 'bbb'), ' c']), '', 56);
    assert.deepEqual(lines.map(line => line.text()), ['aaabbb', 'c']);
  });

  it('makes no line for a paragraph of only spaces', function () {
    const {layout} = render(h('div', [h('div', '   '), h('div', 'x')]), '', {width: 100, height: 100});
    const [first, second] = layout.children;
    assert.ok(first.isFormattingBox() && second.isFormattingBox());
    assert.equal(first.borderArea.height, 0);
    assert.equal(second.borderArea.y, 0);
  });
});

describe('line metrics', function () {
  it('centers the font in the line height', function () {
    const {lines} = paragraph(h('div', 'a'), 'div { line-height: 2 }');
    assert.equal(lines[0].height, 32);
    assert.equal(lines[0].baseline, 20);
  });

  it('fits the tallest inline on the line', function () {
    const {lines} = paragraph(h('div', ['a ', h('span', 'b')]), 'span { font-size: 24px }');
    assert.equal(lines[0].height, 30);
    assert.equal(lines[0].baseline, 21);
    assert.deepEqual(lines[0].fragments.map(f => [f.text, f.x, f.y]), [
      ['a', 0, 21],
      [' ', 8, 21],
      ['b', 12, 21]
    ]);
  });
});

describe('positioning', function () {
  it('aligns lines', function () {
    const centered = paragraph(h('div', 'ab'), 'div { text-align: center }');
    assert.equal(centered.lines[0].x, 42);
    assert.equal(centered.lines[0].fragments[0].x, 42);
    const right = paragraph(h('div', 'ab'), 'div { text-align: right }');
    assert.equal(right.lines[0].fragments[0].x, 84);
  });

  it('makes fragments absolute', function () {
    const {document, layout} = render(
      h('div', [h('p', 'hi')]),
      'div { padding: 5px 7px } p { margin: 0 }',
      {width: 100, height: 100}
    );
    const [line] = ifcOf(blockOf(layout, el(document, 'p'))).paragraph.lineboxes;
    assert.deepEqual(line.fragments.map(f => [f.x, f.y]), [[7, 19]]);
  });

  it('makes a background box for each inline on a line', function () {
    const {document, layout, ifc} = paragraph(
      h('div', [h('span', 'ab')]),
      'span { border: 2px solid red; padding: 0 3px }'
    );
    const span = inlineOf(layout, el(document, 'span'));
    const [box] = ifc.paragraph.backgroundBoxes.get(span) ?? [];
    assert.equal(box.x, 0);
    assert.equal(box.width, 26);
    assert.equal(box.y, 0);
    assert.equal(box.height, 20);
    assert.equal(box.naturalStart && box.naturalEnd, true);
    assert.equal(ifc.paragraph.lineboxes[0].fragments[0].x, 5);
  });

  it('splits the background of an inline across lines', function () {
    const {document, layout, ifc} = paragraph(h('div', [h('span', 'aaaa bbbb')]), '', 50);
    const span = inlineOf(layout, el(document, 'span'));
    const boxes = ifc.paragraph.backgroundBoxes.get(span) ?? [];
    assert.deepEqual(boxes.map(b => [b.x, b.y, b.width, b.naturalStart, b.naturalEnd]), [
      [0, 2, 32, true, false],
      [0, 22, 32, false, true]
    ]);
  });

  it('shifts relatively positioned inlines', function () {
    const {lines} = paragraph(h('div', ['a', h('span', 'b')]), 'span { position: relative; left: 3px; top: 2px }');
    assert.deepEqual(lines[0].fragments.map(f => [f.text, f.x, f.y]), [
      ['a', 0, 14],
      ['b', 11, 16]
    ]);
  });
});
