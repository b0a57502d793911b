import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {h} from '../src/dom.js';
import {black, blue, green, red, render} from './util.js';

import type {DisplayList} from '../src/display-list.js';

const font16 = {families: ['sans-serif'], size: 16, weight: 400, style: 'normal'};

function texts(list: DisplayList) {
  return list.flatMap(op => op.op === 'drawText' ? [op.text] : []);
}

function fills(list: DisplayList) {
  return list.flatMap(op => op.op === 'fillRect' ? [op.color] : []);
}

describe('paint', function () {
  it('paints the root background over the whole viewport', function () {
    const {displayList} = render(h('div'), 'div { background-color: red; height: 10px }', {width: 100, height: 50});
    assert.deepEqual(displayList, [{op: 'fillRect', x: 0, y: 0, width: 100, height: 50, color: red}]);
  });

  it('paints nothing for transparent boxes', function () {
    const {displayList} = render(h('div', [h('div')]), 'div div { height: 10px }');
    assert.deepEqual(displayList, []);
    assert.equal(Object.isFrozen(displayList), true);
  });

  it('clips the background and strokes borders down the middle', function () {
    const {displayList} = render(
      h('div', [h('div', {attrs: {class: 'a'}})]),
      '.a { background-color: blue; background-clip: padding-box; padding: 5px;' +
      '  border: 2px solid black; width: 20px; height: 10px }'
    );
    const stroke = {op: 'strokeBorder', width: 2, style: 'solid', color: black};
    assert.deepEqual(displayList, [
      {op: 'fillRect', x: 2, y: 2, width: 30, height: 20, color: blue},
      {...stroke, side: 'top', x1: 0, y1: 1, x2: 34, y2: 1},
      {...stroke, side: 'right', x1: 33, y1: 0, x2: 33, y2: 24},
      {...stroke, side: 'bottom', x1: 0, y1: 23, x2: 34, y2: 23},
      {...stroke, side: 'left', x1: 1, y1: 0, x2: 1, y2: 24}
    ]);
  });

  it('paints blocks in document order', function () {
    const {displayList} = render(
      h('div', [h('div', {attrs: {class: 'a'}}, [h('div', {attrs: {class: 'b'}})]), h('div', {attrs: {class: 'c'}})]),
      'div div { height: 10px } .a { background-color: red } .b { background-color: blue } .c { background-color: green }'
    );
    assert.deepEqual(fills(displayList), [red, blue, green]);
  });

  it('paints negative z-index below and positive above normal flow', function () {
    const {displayList} = render(
      h('div', [
        h('div', {attrs: {class: 'up'}}),
        h('div', {attrs: {class: 'down'}}),
        h('div', {attrs: {class: 'flow'}})
      ]),
      'div div { height: 10px }' +
      '.up { position: relative; z-index: 1; background-color: red }' +
      '.down { position: relative; z-index: -1; background-color: blue }' +
      '.flow { background-color: green }'
    );
    assert.deepEqual(fills(displayList), [blue, green, red]);
  });

  it('orders layers by z-index, then document order', function () {
    const {displayList} = render(
      h('div', [
        h('div', {style: 'z-index: 2; background-color: red'}),
        h('div', {style: 'z-index: 1; background-color: blue'}),
        h('div', {style: 'z-index: 1; background-color: green'})
      ]),
      'div div { position: relative; height: 10px }'
    );
    assert.deepEqual(fills(displayList), [blue, green, red]);
  });

  it('lifts positioned inlines with a z-index', function () {
    const {displayList} = render(
      h('div', [h('span', 'a'), ' b']),
      'span { position: relative; z-index: 1 }'
    );
    assert.deepEqual(texts(displayList), ['b', 'a']);
  });

  it('skips only the hidden box itself', function () {
    const {displayList} = render(
      h('div', [h('div', {attrs: {class: 'hidden'}}, [h('div', {attrs: {class: 'shown'}})])]),
      '.hidden { visibility: hidden; background-color: red }' +
      '.shown { visibility: visible; background-color: blue; height: 10px }'
    );
    assert.deepEqual(displayList, [{op: 'fillRect', x: 0, y: 0, width: 1200, height: 10, color: blue}]);
  });

  it('draws words at their baselines', function () {
    const {displayList} = render(h('div', 'one two'));
    assert.deepEqual(displayList, [
      {op: 'drawText', x: 0, y: 14, text: 'one', font: font16, color: black},
      {op: 'drawText', x: 28, y: 14, text: 'two', font: font16, color: black}
    ]);
  });

  it('draws hidden text as nothing', function () {
    const {displayList} = render(h('div', {style: 'visibility: hidden'}, 'x'));
    assert.deepEqual(displayList, []);
  });

  it('underlines and strikes through after the text', function () {
    const {displayList} = render(h('div', [h('u', 'ab'), ' ', h('s', 'c')]));
    assert.deepEqual(displayList, [
      {op: 'drawText', x: 0, y: 14, text: 'ab', font: font16, color: black},
      {op: 'drawText', x: 20, y: 14, text: 'c', font: font16, color: black},
      {op: 'fillRect', x: 0, y: 15, width: 16, height: 1, color: black},
      {op: 'fillRect', x: 20, y: 9.5, width: 8, height: 1, color: black}
    ]);
  });

  it('paints inline borders before the text', function () {
    const {displayList} = render(h('div', [h('span', 'ab')]), 'span { border: 2px solid red }');
    const stroke = {op: 'strokeBorder', width: 2, style: 'solid', color: red};
    assert.deepEqual(displayList, [
      {...stroke, side: 'top', x1: 0, y1: 1, x2: 20, y2: 1},
      {...stroke, side: 'right', x1: 19, y1: 0, x2: 19, y2: 20},
      {...stroke, side: 'bottom', x1: 0, y1: 19, x2: 20, y2: 19},
      {...stroke, side: 'left', x1: 1, y1: 0, x2: 1, y2: 20},
      {op: 'drawText', x: 2, y: 14, text: 'ab', font: font16, color: black}
    ]);
  });

  it('paints list markers after the item text', function () {
    const {displayList} = render(h('ul', [h('li', 'a')]));
    assert.deepEqual(displayList, [
      {op: 'drawText', x: 40, y: 30, text: 'a', font: font16, color: black},
      {op: 'drawText', x: 24, y: 30, text: '•', font: font16, color: black}
    ]);
  });

  it('leaves a placeholder for images with a source', function () {
    const {displayList} = render(h('div', [
      h('img', {attrs: {width: '100', height: '50', src: 'a.png'}}),
      h('img', {attrs: {width: '10', height: '10'}})
    ]));
    assert.deepEqual(displayList, [{op: 'image', x: 0, y: 0, width: 100, height: 50, src: 'a.png'}]);
  });
});
