import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {replay} from '../src/display-list.js';
import {SvgRenderer} from '../src/paint-svg.js';
import {black, red} from './util.js';

import type {DisplayList, Renderer} from '../src/display-list.js';
import type {FontDescriptor} from '../src/text-measure.js';

const font16: FontDescriptor = {families: ['sans-serif'], size: 16, weight: 400, style: 'normal'};

function svg(width: number, height: number, body: string) {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">${body}</svg>`;
}

class RecordingRenderer implements Renderer {
  calls: unknown[][] = [];

  clear(width: number, height: number) {
    this.calls.push(['clear', width, height]);
  }

  fillRect(x: number, y: number, width: number, height: number) {
    this.calls.push(['fillRect', x, y, width, height]);
  }

  strokeBorder(x1: number, y1: number, x2: number, y2: number, width: number) {
    this.calls.push(['strokeBorder', x1, y1, x2, y2, width]);
  }

  drawText(x: number, y: number, text: string, font: FontDescriptor) {
    this.calls.push(['drawText', x, y, text, font.size]);
  }

  image(x: number, y: number, width: number, height: number, src: string) {
    this.calls.push(['image', x, y, width, height, src]);
  }
}

describe('replay', function () {
  it('scales every length by the viewport scale', function () {
    const list: DisplayList = [
      {op: 'fillRect', x: 1, y: 2, width: 3, height: 4, color: red},
      {op: 'strokeBorder', side: 'top', x1: 0, y1: 0.5, x2: 10, y2: 0.5, width: 1, style: 'solid', color: red},
      {op: 'drawText', x: 5, y: 14, text: 'hi', font: font16, color: black},
      {op: 'image', x: 0, y: 20, width: 8, height: 6, src: 'x.png'}
    ];
    const renderer = new RecordingRenderer();
    replay(list, renderer, {width: 100, height: 50, scale: 2});
    assert.deepEqual(renderer.calls, [
      ['clear', 200, 100],
      ['fillRect', 2, 4, 6, 8],
      ['strokeBorder', 0, 1, 20, 1, 2],
      ['drawText', 10, 28, 'hi', 32],
      ['image', 0, 40, 16, 12, 'x.png']
    ]);
    assert.equal(font16.size, 16);
  });
});

describe('SvgRenderer', function () {
  it('writes rectangles', function () {
    const renderer = new SvgRenderer();
    replay([{op: 'fillRect', x: 1, y: 2, width: 3, height: 4, color: red}], renderer, {width: 10, height: 5});
    assert.equal(
      renderer.toString(),
      svg(10, 5, '<rect x="1" y="2" width="3" height="4" fill="rgba(255, 0, 0, 1)" />')
    );
  });

  it('dashes dotted and dashed borders', function () {
    const renderer = new SvgRenderer();
    const list: DisplayList = [
      {op: 'strokeBorder', side: 'top', x1: 0, y1: 1, x2: 10, y2: 1, width: 2, style: 'dashed', color: red},
      {op: 'strokeBorder', side: 'left', x1: 1, y1: 0, x2: 1, y2: 10, width: 2, style: 'dotted', color: red}
    ];
    replay(list, renderer, {width: 10, height: 10});
    assert.equal(renderer.toString(), svg(10, 10,
      '<line x1="0" y1="1" x2="10" y2="1" stroke="rgba(255, 0, 0, 1)" stroke-width="2" stroke-dasharray="6 6" />' +
      '<line x1="1" y1="0" x2="1" y2="10" stroke="rgba(255, 0, 0, 1)" stroke-width="2" stroke-dasharray="2 2" />'
    ));
  });

  it('escapes text and keeps its spaces', function () {
    const renderer = new SvgRenderer();
    replay([{op: 'drawText', x: 0, y: 14, text: 'a<b & "c"', font: font16, color: black}], renderer, {
      width: 100,
      height: 20
    });
    assert.equal(renderer.toString(), svg(100, 20,
      '<text x="0" y="14" style="font: 400 16px sans-serif; white-space: pre" fill="rgba(0, 0, 0, 1)">' +
      'a&lt;b &amp; &quot;c&quot;</text>'
    ));
  });

  it('quotes family names in the font', function () {
    const renderer = new SvgRenderer();
    const font: FontDescriptor = {families: ['Test Sans'], size: 10, weight: 700, style: 'italic'};
    renderer.drawText(0, 0, 'x', font, black);
    assert.equal(
      renderer.toString(),
      svg(0, 0, '<text x="0" y="0" style="font: italic 700 10px &quot;Test Sans&quot;; white-space: pre" fill="rgba(0, 0, 0, 1)">x</text>')
    );
  });

  it('starts over on every replay', function () {
    const renderer = new SvgRenderer();
    replay([{op: 'image', x: 0, y: 0, width: 1, height: 1, src: 'a.png?x=1&y=2'}], renderer, {width: 1, height: 1});
    replay([], renderer, {width: 2, height: 2});
    assert.equal(renderer.toString(), svg(2, 2, ''));
  });

  it('writes images with an escaped href', function () {
    const renderer = new SvgRenderer();
    replay([{op: 'image', x: 0, y: 0, width: 1, height: 1, src: 'a.png?x=1&y=2'}], renderer, {width: 1, height: 1});
    assert.equal(renderer.toString(), svg(1, 1, '<image x="0" y="0" width="1" height="1" href="a.png?x=1&amp;y=2" />'));
  });
});
