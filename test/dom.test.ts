import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {dom, h, t, NO_NODE} from '../src/dom.js';

describe('dom', function () {
  const doc = dom(h('div', {attrs: {class: 'outer  box'}}, [
    h('p', {attrs: {id: 'first'}}, 'a'),
    'b',
    h('p', [t('c'), h('span', 'd')])
  ]));

  it('numbers nodes in document order', function () {
    assert.deepEqual(doc.nodes.map(node => node.isElement() ? node.tagName : node.text), [
      'div', 'p', 'a', 'b', 'p', 'c', 'span', 'd'
    ]);
    assert.equal(doc.root.id, 0);
    assert.equal(doc.root.parent, NO_NODE);
    assert.deepEqual(doc.root.children, [1, 3, 4]);
    assert.equal(doc.node(6).parent, 4);
  });

  it('only returns elements from element()', function () {
    assert.equal(doc.element(3), undefined);
    assert.equal(doc.element(1)?.tagName, 'p');
    assert.throws(() => doc.node(100), /No node 100/);
  });

  it('splits the class attribute', function () {
    assert.deepEqual(doc.root.classList, ['outer', 'box']);
    assert.equal(doc.element(1)?.elementId, 'first');
  });

  it('puts the style shorthand into attrs', function () {
    const styled = dom(h('div', {style: 'color: red', attrs: {title: 'x'}}));
    assert.deepEqual(styled.root.attrs, {title: 'x', style: 'color: red'});
  });

  it('queries with selectors', function () {
    assert.equal(doc.query('#first')?.id, 1);
    assert.equal(doc.query('p span')?.id, 6);
    assert.deepEqual(doc.queryAll('div > p').map(el => el.id), [1, 4]);
    assert.equal(doc.query('p + p')?.id, 4);
    assert.deepEqual(doc.queryAll('p:first-child').map(el => el.id), [1]);
  });

  it('matches the root element itself', function () {
    assert.equal(doc.query('div')?.id, 0);
    assert.equal(doc.query('.box')?.id, 0);
    assert.deepEqual(doc.queryAll('div, span').map(el => el.id), [0, 6]);
    const single = dom(h('p', {attrs: {class: 'x'}}, 'hi'));
    assert.equal(single.query('p.x')?.id, 0);
    assert.equal(single.queryAll('p').length, 1);
  });

  it('follows child paths with getEl', function () {
    assert.equal(doc.getEl(doc.root, [2, 1])?.id, 6);
    assert.equal(doc.getEl(doc.root, [0, 0])?.id, 2);
    assert.equal(doc.getEl(doc.root, [9]), undefined);
  });

  it('concatenates textContent', function () {
    assert.equal(doc.textContent(doc.root), 'abcd');
    assert.equal(doc.textContent(doc.node(4)), 'cd');
  });
});
