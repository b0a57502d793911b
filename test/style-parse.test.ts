import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {parsePropertyValue, isModeledProperty} from '../src/style-parse.js';
import {inherited, initial} from '../src/style.js';

describe('parsePropertyValue', function () {
  describe('colors', function () {
    it('parses named colors and hex', function () {
      assert.deepEqual(parsePropertyValue('color', 'Red'), {color: {r: 255, g: 0, b: 0, a: 1}});
      assert.deepEqual(parsePropertyValue('color', '#0f08'), {color: {r: 0, g: 255, b: 0, a: 0x88 / 255}});
      assert.deepEqual(parsePropertyValue('color', '#102030'), {color: {r: 16, g: 32, b: 48, a: 1}});
    });

    it('parses rgb() in both syntaxes', function () {
      assert.deepEqual(parsePropertyValue('color', 'rgba(1, 2, 3, 0.25)'), {color: {r: 1, g: 2, b: 3, a: 0.25}});
      assert.deepEqual(parsePropertyValue('color', 'rgb(1 2 3 / 50%)'), {color: {r: 1, g: 2, b: 3, a: 0.5}});
      assert.deepEqual(parsePropertyValue('background-color', 'rgb(300, 0, 0)'), {
        backgroundColor: {r: 255, g: 0, b: 0, a: 1}
      });
    });

    it('rejects junk', function () {
      assert.equal(parsePropertyValue('color', '#12345'), undefined);
      assert.equal(parsePropertyValue('color', 'notacolor'), undefined);
      assert.equal(parsePropertyValue('color', 'rgb(1, 2)'), undefined);
    });
  });

  describe('lengths', function () {
    it('converts absolute units to px', function () {
      assert.deepEqual(parsePropertyValue('width', '1in'), {width: 96});
      assert.deepEqual(parsePropertyValue('width', '12pt'), {width: 16});
      assert.deepEqual(parsePropertyValue('width', '0'), {width: 0});
    });

    it('keeps relative units and percentages', function () {
      assert.deepEqual(parsePropertyValue('width', '60vw'), {width: {value: 60, unit: 'vw'}});
      assert.deepEqual(parsePropertyValue('margin-left', '-2em'), {marginLeft: {value: -2, unit: 'em'}});
      assert.deepEqual(parsePropertyValue('height', '50%'), {height: {value: 50, unit: '%'}});
    });

    it('rejects negative widths and unitless non-zero numbers', function () {
      assert.equal(parsePropertyValue('width', '-5px'), undefined);
      assert.equal(parsePropertyValue('padding-top', '-1px'), undefined);
      assert.equal(parsePropertyValue('width', '5'), undefined);
    });
  });

  describe('shorthands', function () {
    it('expands margin and padding', function () {
      assert.deepEqual(parsePropertyValue('margin', '1px 2px'), {
        marginTop: 1, marginRight: 2, marginBottom: 1, marginLeft: 2
      });
      assert.deepEqual(parsePropertyValue('padding', '1px 2px 3px'), {
        paddingTop: 1, paddingRight: 2, paddingBottom: 3, paddingLeft: 2
      });
      assert.deepEqual(parsePropertyValue('margin', '0 auto'), {
        marginTop: 0, marginRight: 'auto', marginBottom: 0, marginLeft: 'auto'
      });
      assert.equal(parsePropertyValue('margin', '1px 2px 3px 4px 5px'), undefined);
    });

    it('expands border, resetting omitted parts', function () {
      assert.deepEqual(parsePropertyValue('border-left', 'dashed'), {
        borderLeftWidth: 3,
        borderLeftStyle: 'dashed',
        borderLeftColor: 'currentcolor'
      });
      const border = parsePropertyValue('border', '2px solid red');
      assert.equal(border?.borderBottomWidth, 2);
      assert.equal(border?.borderRightStyle, 'solid');
      assert.deepEqual(border?.borderTopColor, {r: 255, g: 0, b: 0, a: 1});
    });

    it('expands font', function () {
      assert.deepEqual(parsePropertyValue('font', 'italic bold 12px/1.5 "Open Sans", serif'), {
        fontStyle: 'italic',
        fontWeight: 'bold',
        fontSize: 12,
        lineHeight: {value: 1.5, unit: null},
        fontFamily: ['Open Sans', 'serif']
      });
      assert.deepEqual(parsePropertyValue('font', '20px monospace'), {
        fontStyle: 'normal',
        fontWeight: 'normal',
        lineHeight: 'normal',
        fontSize: 20,
        fontFamily: ['monospace']
      });
      assert.equal(parsePropertyValue('font', 'bold serif'), undefined);
    });

    it('takes the color out of background', function () {
      assert.deepEqual(parsePropertyValue('background', 'blue'), {
        backgroundColor: {r: 0, g: 0, b: 255, a: 1}
      });
    });
  });

  it('parses display keywords into outer and inner parts', function () {
    assert.deepEqual(parsePropertyValue('display', 'inline-block'), {
      display: {outer: 'inline', inner: 'flow-root', listItem: false}
    });
    assert.deepEqual(parsePropertyValue('display', 'list-item'), {
      display: {outer: 'block', inner: 'flow', listItem: true}
    });
    assert.equal(parsePropertyValue('display', 'grid'), undefined);
  });

  it('parses text-decoration', function () {
    assert.deepEqual(parsePropertyValue('text-decoration', 'underline line-through'), {
      textDecorationLine: {underline: true, lineThrough: true}
    });
    assert.deepEqual(parsePropertyValue('text-decoration', 'underline wavy red'), {
      textDecorationLine: {underline: true, lineThrough: false}
    });
    assert.equal(parsePropertyValue('text-decoration-line', 'underline wavy'), undefined);
    assert.equal(parsePropertyValue('text-decoration', 'none underline'), undefined);
  });

  it('accepts only integer z-index', function () {
    assert.deepEqual(parsePropertyValue('z-index', '-3'), {zIndex: -3});
    assert.deepEqual(parsePropertyValue('z-index', 'auto'), {zIndex: 'auto'});
    assert.equal(parsePropertyValue('z-index', '1.5'), undefined);
  });

  describe('CSS-wide keywords', function () {
    it('applies inherit and initial to every longhand', function () {
      assert.deepEqual(parsePropertyValue('color', 'inherit'), {color: inherited});
      assert.deepEqual(parsePropertyValue('padding', 'initial'), {
        paddingTop: initial, paddingRight: initial, paddingBottom: initial, paddingLeft: initial
      });
    });

    it('treats unset as inherit only for inherited properties', function () {
      assert.deepEqual(parsePropertyValue('color', 'unset'), {color: inherited});
      assert.deepEqual(parsePropertyValue('border-top', 'unset'), {
        borderTopWidth: initial, borderTopStyle: initial, borderTopColor: initial
      });
    });
  });

  it('knows which properties it models', function () {
    assert.equal(isModeledProperty('Margin-Top'), true);
    assert.equal(isModeledProperty('grid-template-areas'), false);
    assert.equal(parsePropertyValue('grid-template-areas', '"a"'), undefined);
  });
});
