import * as box from '../src/api.js';
import fs from 'node:fs';

// Any MeasurementProvider works here. The fixed one needs no font files.
const measurement = new box.FixedMetricsProvider();

const stylesheet = `
  div { background-color: rgb(28, 10, 0); text-align: center; color: rgb(179, 200, 144); }
  span { color: rgb(115, 169, 173); font-weight: 700; }
`;

// Create a DOM
const document = box.dom(
  box.h('div', [
    'Hello, ',
    box.h('span', ['World!'])
  ])
);

const viewport = {width: 250, height: 50, scale: 2};
const result = box.pipeline({document, stylesheet, viewport, measurement});

// Save your image
const svg = box.paintToSvg(result.displayList, viewport);
fs.writeFileSync(new URL('hello.svg', import.meta.url), svg);
