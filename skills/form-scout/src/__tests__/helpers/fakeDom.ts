import { LABEL_SKIPPED_TAGS, type DomElement } from '../../dom';

type Child = FakeElement | string;

interface SimpleSelector {
  tag?: string;
  attrs: Array<{ name: string; value?: string }>;
}

const SIMPLE_SELECTOR_RE = /^([a-z][a-z0-9-]*)?((?:\[[^\]]+\])*)$/i;
const ATTR_RE = /\[([\w-]+)(?:="((?:[^"\\]|\\.)*)")?\]/g;

// Supports comma-separated lists of tag[attr="value"][attr] selectors
function parseSelector(selector: string): SimpleSelector[] {
  return selector.split(',').map((part) => {
    const match = part.trim().match(SIMPLE_SELECTOR_RE);
    if (!match) throw new Error(`Unsupported selector in fake DOM: ${part}`);
    const attrs = Array.from(match[2].matchAll(ATTR_RE), (m) => ({
      name: m[1],
      value: m[2]?.replace(/\\(.)/g, '$1'),
    }));
    return { tag: match[1]?.toLowerCase(), attrs };
  });
}

/**
 * In-memory element for exercising code written against DomElement.
 */
export class FakeElement implements DomElement {
  parent: FakeElement | null = null;
  readonly screenshots: string[] = [];
  private broken = false;

  constructor(
    readonly tag: string,
    readonly attrs: Record<string, string>,
    readonly nodes: Child[],
  ) {
    for (const node of nodes) {
      if (node instanceof FakeElement) node.parent = this;
    }
  }

  /** Make every read on this element reject, as a detached element would */
  breakReads(): this {
    this.broken = true;
    return this;
  }

  private check(): void {
    if (this.broken) throw new Error('Element is detached');
  }

  private text(): string {
    return this.nodes.map((node) => (typeof node === 'string' ? node : node.text())).join('');
  }

  private ownText(): string {
    if (LABEL_SKIPPED_TAGS.includes(this.tag)) return '';
    return this.nodes.map((node) => (typeof node === 'string' ? node : node.ownText())).join('');
  }

  private descendants(): FakeElement[] {
    const result: FakeElement[] = [];
    for (const node of this.nodes) {
      if (node instanceof FakeElement) {
        result.push(node, ...node.descendants());
      }
    }
    return result;
  }

  private matches(selectors: SimpleSelector[]): boolean {
    return selectors.some(
      (sel) =>
        (!sel.tag || sel.tag === this.tag) &&
        sel.attrs.every((attr) =>
          attr.value === undefined ? attr.name in this.attrs : this.attrs[attr.name] === attr.value,
        ),
    );
  }

  async tagName(): Promise<string> {
    this.check();
    return this.tag;
  }

  async getAttribute(name: string): Promise<string | null> {
    this.check();
    return name in this.attrs ? this.attrs[name] : null;
  }

  async textContent(): Promise<string> {
    this.check();
    return this.text();
  }

  async labelText(): Promise<string> {
    this.check();
    return this.ownText();
  }

  async querySelectorAll(selector: string): Promise<DomElement[]> {
    this.check();
    const selectors = parseSelector(selector);
    return this.descendants().filter((el) => el.matches(selectors));
  }

  async closest(tag: string): Promise<DomElement | null> {
    this.check();
    for (let node = this.parent; node; node = node.parent) {
      if (node.tag === tag) return node;
    }
    return null;
  }

  async precedingText(): Promise<string> {
    this.check();
    if (!this.parent) return '';
    const siblings = this.parent.nodes;
    for (let i = siblings.indexOf(this) - 1; i >= 0; i--) {
      const node = siblings[i];
      const text = (typeof node === 'string' ? node : node.text()).trim();
      if (text) return text;
    }
    return '';
  }

  async screenshot(path: string): Promise<void> {
    this.check();
    this.screenshots.push(path);
  }
}

export function el(tag: string, attrs: Record<string, string> = {}, ...children: Child[]): FakeElement {
  return new FakeElement(tag, attrs, children);
}
