import type { Locator } from "playwright";

/**
 * Read-only view of one element, as needed for form inspection.
 * Reads on a detached or stale element reject.
 */
export interface DomElement {
  /** Lower-case tag name */
  tagName(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  textContent(): Promise<string>;
  /** Own text of the element, leaving out the text of nested controls */
  labelText(): Promise<string>;
  /** Matching descendants in document order */
  querySelectorAll(selector: string): Promise<DomElement[]>;
  /** Nearest ancestor with the given tag name */
  closest(tag: string): Promise<DomElement | null>;
  /** Text of the nearest preceding sibling that has any */
  precedingText(): Promise<string>;
  screenshot(path: string): Promise<void>;
}

const READ_TIMEOUT_MS = 2000;

// Controls whose content is not part of a label wrapping them
export const LABEL_SKIPPED_TAGS: readonly string[] = ["select", "textarea", "option", "datalist"];

export class LocatorElement implements DomElement {
  constructor(private readonly locator: Locator) {}

  async tagName(): Promise<string> {
    return this.locator.evaluate((el) => el.tagName.toLowerCase(), undefined, {
      timeout: READ_TIMEOUT_MS,
    });
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name, { timeout: READ_TIMEOUT_MS });
  }

  async textContent(): Promise<string> {
    return (await this.locator.textContent({ timeout: READ_TIMEOUT_MS })) ?? "";
  }

  async labelText(): Promise<string> {
    return this.locator.evaluate(
      (el, skipped) => {
        const collect = (node: Node): string => {
          if (node.nodeType === Node.TEXT_NODE) return node.textContent ?? "";
          if (node instanceof Element && skipped.includes(node.tagName.toLowerCase())) return "";
          return Array.from(node.childNodes, collect).join("");
        };
        return collect(el);
      },
      [...LABEL_SKIPPED_TAGS],
      { timeout: READ_TIMEOUT_MS }
    );
  }

  async querySelectorAll(selector: string): Promise<DomElement[]> {
    const matches = await this.locator.locator(selector).all();
    return matches.map((match) => new LocatorElement(match));
  }

  async closest(tag: string): Promise<DomElement | null> {
    const ancestor = this.locator.locator(`xpath=ancestor::${tag}[1]`);
    return (await ancestor.count()) > 0 ? new LocatorElement(ancestor) : null;
  }

  async precedingText(): Promise<string> {
    return this.locator.evaluate(
      (el) => {
        let node = el.previousSibling;
        while (node) {
          const text = node.textContent?.trim();
          if (text) return text;
          node = node.previousSibling;
        }
        return "";
      },
      undefined,
      { timeout: READ_TIMEOUT_MS }
    );
  }

  async screenshot(path: string): Promise<void> {
    await this.locator.screenshot({ path });
  }
}
