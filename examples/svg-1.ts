import * as box from '../src/api.js';
import fs from 'node:fs';

const {h} = box;

const document = box.dom(
  h('html', {style: 'background-color: #eee; text-align: center;'}, [
    h('div', {style: 'line-height: 1; color: white;'}, [
      h('div', {style: 'display: inline-block;', attrs: {[box.LOG_ATTRIBUTE]: ''}}, [
        h('span', {style: 'padding: 3px; background-color: rgb(212, 35, 41);'}, 'n'),
        h('span', {style: 'padding: 3px; background-color: black;'}, 'p'),
        h('span', {style: 'padding: 3px; background-color: rgb(41, 124, 187);'}, 'r')
      ])
    ]),
    h('p', [
      h('strong', 'more from'),
      ' ',
      h('span', {style: 'display: inline-block; padding: 5px 10px; background-color: #7598c9; color: white;'}, 'news'),
      ' ',
      h('span', {style: 'display: inline-block; padding: 5px 10px; background-color: #7598c9; color: white;'}, 'culture'),
      ' ',
      h('span', {style: 'display: inline-block; padding: 5px 10px; background-color: #7598c9; color: white;'}, 'music')
    ]),
    h('ol', [h('li', 'one'), h('li', 'two')])
  ])
);

const viewport = {width: 600, height: 200};
const result = box.pipeline({
  document,
  stylesheet: 'ol { margin: 0 }',
  viewport,
  measurement: new box.FixedMetricsProvider()
});

result.layout.log();
for (const diagnostic of result.diagnostics) console.warn(`${diagnostic.kind}: ${diagnostic.message}`);

fs.writeFileSync(new URL('svg-1.svg', import.meta.url), box.paintToSvg(result.displayList, viewport));
