import {selectAll, selectOne} from 'css-select';

import type {Options} from 'css-select';

/**
 * Index of a node in its Document. Stable for the life of the document.
 */
export type NodeId = number;

export const NO_NODE: NodeId = -1;

export class TextNode {
  public readonly id: NodeId;
  public text: string;
  public parent: NodeId;

  constructor(id: NodeId, text: string, parent: NodeId = NO_NODE) {
    this.id = id;
    this.text = text;
    this.parent = parent;
  }

  isElement(): this is HTMLElement {
    return false;
  }
}

export class HTMLElement {
  public readonly id: NodeId;
  public tagName: string;
  public parent: NodeId;
  public attrs: Record<string, string>;
  public children: NodeId[];

  constructor(
    id: NodeId,
    tagName: string,
    parent: NodeId = NO_NODE,
    attrs: Record<string, string> = {}
  ) {
    this.id = id;
    this.tagName = tagName.toLowerCase();
    this.parent = parent;
    this.attrs = attrs;
    this.children = [];
  }

  isElement(): this is HTMLElement {
    return true;
  }

  getAttribute(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.attrs, name) ? this.attrs[name] : undefined;
  }

  get classList(): string[] {
    const className = this.getAttribute('class');
    return className ? className.split(/\s+/).filter(Boolean) : [];
  }

  get elementId(): string | undefined {
    return this.getAttribute('id');
  }
}

export type DocNode = HTMLElement | TextNode;

type Adapter = NonNullable<Options<DocNode, HTMLElement>['adapter']>;

/**
 * Arena of nodes. Relationships are stored as NodeIds, never as references,
 * so the whole tree is just `nodes`.
 */
export class Document {
  public nodes: DocNode[];
  public readonly adapter: Adapter;

  constructor() {
    this.nodes = [];
    this.adapter = createAdapter(this);
  }

  private attach(node: DocNode, parent: NodeId) {
    if (parent !== NO_NODE) {
      const parentNode = this.node(parent);
      if (!parentNode.isElement()) throw new Error('Assertion failed');
      parentNode.children.push(node.id);
    }
    this.nodes.push(node);
  }

  createElement(tagName: string, attrs: Record<string, string> = {}, parent = NO_NODE) {
    const el = new HTMLElement(this.nodes.length, tagName, parent, attrs);
    this.attach(el, parent);
    return el;
  }

  createText(text: string, parent = NO_NODE) {
    const node = new TextNode(this.nodes.length, text, parent);
    this.attach(node, parent);
    return node;
  }

  node(id: NodeId): DocNode {
    const node = this.nodes[id];
    if (!node) throw new Error(`No node ${id}`);
    return node;
  }

  element(id: NodeId): HTMLElement | undefined {
    const node = this.nodes[id];
    return node && node.isElement() ? node : undefined;
  }

  /**
   * The first element created without a parent
   */
  get root(): HTMLElement {
    for (const node of this.nodes) {
      if (node.isElement() && node.parent === NO_NODE) return node;
    }
    throw new Error('Document has no root element');
  }

  parentOf(node: DocNode): HTMLElement | null {
    return node.parent === NO_NODE ? null : this.element(node.parent) ?? null;
  }

  childrenOf(node: DocNode): DocNode[] {
    return node.isElement() ? node.children.map(id => this.node(id)) : [];
  }

  /**
   * Follows child indices from `el`, stopping early at a text node
   */
  getEl(el: HTMLElement, path: readonly number[]): DocNode | undefined {
    let node: DocNode | undefined = el;

    for (let i = 0; node && i < path.length; ++i) {
      if (!node.isElement()) break;
      const id: NodeId | undefined = node.children[path[i]];
      node = id === undefined ? undefined : this.node(id);
    }

    return node;
  }

  textContent(node: DocNode): string {
    if (!node.isElement()) return node.text;
    return node.children.map(id => this.textContent(this.node(id))).join('');
  }

  /**
   * Nodes under and including `from` in document order
   */
  *preorder(from: DocNode = this.root): Generator<DocNode> {
    const stack: DocNode[] = [from];
    while (stack.length) {
      const node = stack.pop();
      if (!node) break;
      yield node;
      if (node.isElement()) {
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push(this.node(node.children[i]));
        }
      }
    }
  }

  query(selector: string): HTMLElement | null {
    return selectOne<DocNode, HTMLElement>(selector, [this.root], {adapter: this.adapter});
  }

  queryAll(selector: string): HTMLElement[] {
    return selectAll<DocNode, HTMLElement>(selector, [this.root], {adapter: this.adapter});
  }
}

function createAdapter(doc: Document): Adapter {
  const getElementChildren = (node: DocNode) => {
    return doc.childrenOf(node).filter((c): c is HTMLElement => c.isElement());
  };

  const adapter: Adapter = {
    isTag: (node: DocNode): node is HTMLElement => node.isElement(),
    existsOne(test, elems) {
      return elems.some(elem => {
        if (!elem.isElement()) return false;
        return test(elem) || adapter.existsOne(test, doc.childrenOf(elem));
      });
    },
    getAttributeValue(elem, name) {
      return elem.getAttribute(name);
    },
    getChildren(node) {
      return doc.childrenOf(node);
    },
    getName(elem) {
      return elem.tagName;
    },
    getParent(node) {
      return doc.parentOf(node);
    },
    getSiblings(node) {
      const parent = doc.parentOf(node);
      return parent ? doc.childrenOf(parent) : [node];
    },
    prevElementSibling(node) {
      const parent = doc.parentOf(node);
      if (!parent) return null;
      const siblings = getElementChildren(parent);
      const i = siblings.findIndex(sibling => sibling.id === node.id);
      return i > 0 ? siblings[i - 1] : null;
    },
    getText(node) {
      return doc.textContent(node);
    },
    hasAttrib(elem, name) {
      return elem.getAttribute(name) !== undefined;
    },
    removeSubsets(nodes) {
      return nodes.filter((node, i) => {
        if (nodes.indexOf(node) !== i) return false;
        for (let a = doc.parentOf(node); a; a = doc.parentOf(a)) {
          if (nodes.includes(a)) return false;
        }
        return true;
      });
    },
    findAll(test, nodes) {
      const ret: HTMLElement[] = [];
      for (const node of nodes) {
        if (!node.isElement()) continue;
        for (const el of doc.preorder(node)) {
          if (el.isElement() && test(el)) ret.push(el);
        }
      }
      return ret;
    },
    findOne(test, nodes) {
      for (const node of nodes) {
        if (!node.isElement()) continue;
        for (const el of doc.preorder(node)) {
          if (el.isElement() && test(el)) return el;
        }
      }
      return null;
    }
  };

  return adapter;
}

type HsChild = ElementDescription | TextDescription | string;

export interface ElementDescription {
  tagName: string;
  attrs: Record<string, string>;
  children: HsChild[];
}

export interface TextDescription {
  text: string;
}

interface HsData {
  /** declarations for the element's style attribute */
  style?: string;
  attrs?: {[k: string]: string};
}

export function h(tagName: string): ElementDescription;
export function h(tagName: string, data: HsData): ElementDescription;
export function h(tagName: string, children: HsChild[]): ElementDescription;
export function h(tagName: string, text: string): ElementDescription;
export function h(tagName: string, data: HsData, children: HsChild[] | string): ElementDescription;
export function h(
  tagName: string,
  arg2?: HsData | HsChild[] | string,
  arg3?: HsChild[] | string
): ElementDescription {
  let data: HsData = {};
  let children: HsChild[] = [];

  if (typeof arg2 === 'string') {
    children = [arg2];
  } else if (Array.isArray(arg2)) {
    children = arg2;
  } else if (arg2) {
    data = arg2;
  }

  if (Array.isArray(arg3)) {
    children = arg3;
  } else if (typeof arg3 === 'string') {
    children = [arg3];
  }

  const attrs = {...data.attrs};
  if (data.style !== undefined) attrs.style = data.style;

  return {tagName, attrs, children};
}

export function t(text: string): TextDescription {
  return {text};
}

/**
 * Builds a Document from the h()/t() description. `root` becomes the root
 * element as-is.
 */
export function dom(root: ElementDescription): Document {
  const doc = new Document();
  const stack: [HsChild, NodeId][] = [[root, NO_NODE]];

  while (stack.length) {
    const entry = stack.pop();
    if (!entry) break;
    const [desc, parent] = entry;
    if (typeof desc === 'string') {
      doc.createText(desc, parent);
    } else if ('text' in desc) {
      doc.createText(desc.text, parent);
    } else {
      const el = doc.createElement(desc.tagName, {...desc.attrs}, parent);
      for (let i = desc.children.length - 1; i >= 0; i--) {
        stack.push([desc.children[i], el.id]);
      }
    }
  }

  return doc;
}
