import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {h} from '../src/dom.js';
import {boxes, LOG_ATTRIBUTE} from '../src/layout-flow.js';
import {blockOf, el, ifcOf, rect, render} from './util.js';

import type {BlockContainer} from '../src/layout-flow.js';

function geometry(root: BlockContainer) {
  const areas: number[][] = [];
  for (const box of boxes(root)) {
    if (box.isFormattingBox()) {
      const {x, y, width, height} = box.borderArea;
      areas.push([x, y, width, height]);
    }
  }
  return areas;
}

describe('box generation', function () {
  it('wraps inline content next to blocks in anonymous blocks', function () {
    const {layout} = render(h('div', ['text', h('div', 'block'), 'more']));
    assert.equal(layout.children.length, 3);
    assert.deepEqual(layout.children.map(child => child.isAnonymous()), [true, false, true]);
  });

  it('leaves out display: none subtrees', function () {
    const {layout} = render(h('div', [h('div', {style: 'display: none'}, 'gone'), h('div', 'kept')]));
    assert.equal(layout.children.length, 1);
  });

  it('numbers boxes in tree order', function () {
    const {layout} = render(h('div', [h('p', 'a'), h('p', 'b')]));
    assert.deepEqual(Array.from(boxes(layout), box => box.id), ['0', '1', '2', '3', '4']);
  });
});

describe('block layout', function () {
  it('fills the containing block with auto width', function () {
    const {document, layout} = render(h('html', [h('body', [h('p', 'x')])]), 'body { width: 60vw }');
    const body = blockOf(layout, el(document, 'body'));
    assert.equal(body.contentArea.width, 720);
    assert.equal(body.borderArea.x, 8);
    assert.equal(body.margin.right, 472);
  });

  it('centers with auto margins', function () {
    const {document, layout} = render(
      h('div', [h('div', {attrs: {class: 'c'}})]),
      '.c { width: 200px; margin: 0 auto }',
      {width: 1000, height: 100}
    );
    assert.equal(blockOf(layout, el(document, '.c')).borderArea.x, 400);
  });

  it('includes padding and border in border-box widths', function () {
    const {document, layout} = render(
      h('div', [h('div', {attrs: {class: 'b'}})]),
      '.b { box-sizing: border-box; width: 100px; padding: 10px; border: 5px solid }'
    );
    const box = blockOf(layout, el(document, '.b'));
    assert.equal(box.borderArea.width, 100);
    assert.equal(box.contentArea.width, 70);
    assert.equal(box.contentArea.x, 15);
  });

  it('collapses the margins of adjacent siblings', function () {
    const {document, layout} = render(
      h('div', [h('div', {attrs: {class: 'a'}}), h('div', {attrs: {class: 'b'}})]),
      '.a { height: 10px; margin-bottom: 10px } .b { height: 10px; margin-top: 20px }'
    );
    const a = blockOf(layout, el(document, '.a'));
    const b = blockOf(layout, el(document, '.b'));
    assert.equal(a.borderArea.y, 0);
    assert.equal(b.borderArea.y - (a.borderArea.y + a.borderArea.height), 20);
  });

  it('collapses a first child margin through its parent', function () {
    const {document, layout} = render(
      h('div', [h('section', [h('div', {attrs: {class: 'inner'}})])]),
      'section { margin-top: 10px } .inner { margin-top: 30px; height: 10px }'
    );
    const section = blockOf(layout, el(document, 'section'));
    const inner = blockOf(layout, el(document, '.inner'));
    assert.deepEqual(rect(section), {x: 0, y: 30, width: 1200, height: 10});
    assert.equal(inner.borderArea.y, 30);
  });

  it('does not collapse through padding', function () {
    const {document, layout} = render(
      h('div', [h('section', [h('div', {attrs: {class: 'inner'}})])]),
      'section { margin-top: 10px; padding-top: 1px } .inner { margin-top: 30px; height: 10px }'
    );
    assert.equal(blockOf(layout, el(document, 'section')).borderArea.y, 10);
    assert.equal(blockOf(layout, el(document, '.inner')).borderArea.y, 41);
  });

  it('resolves percentage heights against a definite height', function () {
    const {document, layout, diagnostics} = render(
      h('div', {attrs: {class: 'outer'}}, [h('div', {attrs: {class: 'half'}})]),
      '.outer { height: 100px } .half { height: 50% }'
    );
    assert.equal(blockOf(layout, el(document, '.half')).borderArea.height, 50);
    assert.deepEqual(diagnostics, []);
  });

  it('reports percentage heights with nothing to resolve against', function () {
    const {document, layout, diagnostics} = render(
      h('div', [h('div', {attrs: {class: 'half'}})]),
      '.half { height: 50% }'
    );
    const half = el(document, '.half');
    assert.equal(blockOf(layout, half).borderArea.height, 0);
    assert.deepEqual(diagnostics, [{
      kind: 'UnresolvedDimension',
      message: 'height: 50% has no definite containing block height',
      node: half.id
    }]);
  });

  it('gives the same geometry after laying out at another size and back', function () {
    const root = h('html', [h('body', [
      h('p', 'Some words that wrap differently at different widths'),
      h('div', {attrs: {class: 'half'}}, 'half')
    ])]);
    const css = 'body { width: 60vw } .half { width: 50%; padding: 2vw }';
    const wide = render(root, css, {width: 1200, height: 800});
    const narrow = render(root, css, {width: 800, height: 800});
    const again = render(root, css, {width: 1200, height: 800});
    assert.deepEqual(geometry(again.layout), geometry(wide.layout));
    assert.notDeepEqual(geometry(narrow.layout), geometry(wide.layout));
  });
});

describe('inline-blocks', function () {
  it('shrinks to fit its content', function () {
    const {document, layout} = render(h('div', [h('span', 'abc')]), 'span { display: inline-block }');
    const span = blockOf(layout, el(document, 'span'));
    assert.deepEqual(rect(span), {x: 0, y: 0, width: 24, height: 20});
    assert.equal(layout.contentArea.height, 20);
    const [line] = ifcOf(span).paragraph.lineboxes;
    assert.deepEqual(line.fragments.map(f => [f.x, f.y]), [[0, 14]]);
  });

  it('reports percentage widths inside shrink-to-fit boxes', function () {
    const {document, diagnostics} = render(
      h('div', [h('span', [h('div', {attrs: {class: 'w'}}, 'x')])]),
      'span { display: inline-block } .w { width: 50% }'
    );
    assert.deepEqual(diagnostics.filter(d => d.kind === 'UnresolvedDimension'), [{
      kind: 'UnresolvedDimension',
      message: 'width: 50% has no definite containing block width',
      node: el(document, '.w').id
    }]);
  });
});

describe('positioning', function () {
  it('places absolute boxes in the padding box of the positioned ancestor', function () {
    const {document, layout} = render(
      h('div', {attrs: {class: 'cb'}}, [h('div', {attrs: {class: 'abs'}})]),
      '.cb { position: relative; padding: 10px; height: 100px }' +
      '.abs { position: absolute; top: 5px; left: 7px; width: 20px; height: 20px }'
    );
    assert.deepEqual(rect(blockOf(layout, el(document, '.abs'))), {x: 7, y: 5, width: 20, height: 20});
  });

  it('places fixed boxes against the viewport', function () {
    const {document, layout} = render(
      h('div', [h('div', {attrs: {class: 'f'}})]),
      '.f { position: fixed; right: 0; bottom: 0; width: 10px; height: 10px }'
    );
    assert.deepEqual(rect(blockOf(layout, el(document, '.f'))), {x: 1190, y: 790, width: 10, height: 10});
  });

  it('stretches absolute boxes between left and right', function () {
    const {document, layout} = render(
      h('div', [h('div', {attrs: {class: 'f'}})]),
      '.f { position: absolute; left: 100px; right: 100px; top: 0; bottom: 0 }'
    );
    assert.deepEqual(rect(blockOf(layout, el(document, '.f'))), {x: 100, y: 0, width: 1000, height: 800});
  });

  it('uses the static position when offsets are auto', function () {
    const {document, layout} = render(
      h('div', [h('div', {attrs: {class: 'first'}}), h('div', {attrs: {class: 'abs'}})]),
      '.first { height: 10px } .abs { position: absolute; width: 5px; height: 5px }'
    );
    assert.deepEqual(rect(blockOf(layout, el(document, '.abs'))), {x: 0, y: 10, width: 5, height: 5});
  });

  it('shifts relative boxes without moving their siblings', function () {
    const {document, layout} = render(
      h('div', [h('div', {attrs: {class: 'r'}}), h('div', {attrs: {class: 'next'}})]),
      '.r { position: relative; top: 5px; left: 3px; height: 10px } .next { height: 10px }'
    );
    assert.deepEqual(rect(blockOf(layout, el(document, '.r'))), {x: 3, y: 5, width: 1200, height: 10});
    assert.equal(blockOf(layout, el(document, '.next')).borderArea.y, 10);
  });
});

describe('list items', function () {
  it('numbers ordered list items and puts markers outside', function () {
    const {document, layout} = render(h('ol', [h('li', 'a'), h('li', 'b')]));
    const [first, second] = document.queryAll('li').map(li => blockOf(layout, li));
    assert.ok(first.isBlockContainer() && second.isBlockContainer());
    assert.equal(first.borderArea.x, 40);
    assert.deepEqual([first.borderArea.y, second.borderArea.y], [16, 36]);
    assert.deepEqual(
      [first.marker, second.marker].map(m => m && [m.text, m.x, m.y, m.width]),
      [['1.', 16, 30, 16], ['2.', 16, 50, 16]]
    );
  });

  it('counts from the start attribute', function () {
    const {document, layout} = render(h('ol', {attrs: {start: '5'}}, [h('li', 'a'), h('li', 'b')]));
    const texts = document.queryAll('li').map(li => {
      const box = blockOf(layout, li);
      return box.isBlockContainer() ? box.marker?.text : undefined;
    });
    assert.deepEqual(texts, ['5.', '6.']);
  });

  it('uses glyphs for unordered lists and none for list-style: none', function () {
    const {document, layout} = render(h('div', [
      h('ul', [h('li', 'a')]),
      h('ul', {style: 'list-style: none'}, [h('li', 'b')])
    ]));
    const markers = document.queryAll('li').map(li => {
      const box = blockOf(layout, li);
      return box.isBlockContainer() ? box.marker?.text : undefined;
    });
    assert.deepEqual(markers, ['•', undefined]);
  });
});

describe('logging', function () {
  it('logs lines and the box tree of marked elements', function () {
    const out: string[] = [];
    render(h('div', {attrs: {[LOG_ATTRIBUTE]: ''}}, 'hi'), '', undefined, {
      write: s => out.push(s),
      color: false
    });
    assert.equal(out.length, 2);
    assert.equal(out[0], 'Paragraph 1:\n  Line 0 (W:16.00 H:20.00 B:14.00 Y:0.00): “hi” \n');
    assert.ok(out[1].startsWith('◼︎ Block 0 (cb: icb)\n'));
  });
});
