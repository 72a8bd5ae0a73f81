import * as cheerio from 'cheerio';
import { AnyNode, isDirective, isTag, isText } from 'domhandler';

/**
 * One element of a parsed document. Relations are indices into `HtmlDocument.elements`.
 */
export interface HtmlElement {
  readonly index: number;

  /** Lower-cased tag name */
  readonly name: string;

  /** Lower-cased attribute names to decoded values */
  readonly attributes: Readonly<Record<string, string>>;

  /** Index of the parent element, -1 for top level elements */
  readonly parent: number;

  readonly children: readonly number[];

  /** Offsets of the element's markup in the source, end exclusive. -1 when unknown */
  readonly startOffset: number;
  readonly endOffset: number;

  /** Concatenated text of all descendant text nodes */
  readonly text: string;
}

export interface HtmlDoctype {
  readonly name: string;
  readonly publicId: string;
}

/**
 * Immutable, flat view of an HTML document, in document order.
 * Parsed once with source locations so evidence can quote the original markup.
 */
export class HtmlDocument {
  readonly source: string;
  readonly elements: readonly HtmlElement[];
  readonly doctype: HtmlDoctype | null;

  private constructor(source: string, elements: HtmlElement[], doctype: HtmlDoctype | null) {
    this.source = source;
    this.elements = Object.freeze(elements);
    this.doctype = doctype;
    Object.freeze(this);
  }

  static parse(source: string): HtmlDocument {
    const $ = cheerio.load(source, { sourceCodeLocationInfo: true });
    const elements: HtmlElement[] = [];
    let doctype: HtmlDoctype | null = null;

    const visit = (node: AnyNode, parent: number): number => {
      if (isDirective(node)) {
        if (node.name.toLowerCase() === '!doctype' && !doctype) {
          doctype = { name: node['x-name'] ?? '', publicId: node['x-publicId'] ?? '' };
        }
        return -1;
      }
      if (!isTag(node)) {
        return -1;
      }

      const index = elements.length;
      const children: number[] = [];
      const location = node.sourceCodeLocation;
      const attributes: Record<string, string> = {};
      for (const [name, value] of Object.entries(node.attribs)) {
        attributes[name.toLowerCase()] = value;
      }

      // Reserve the slot so indices stay in document order
      elements.push({
        index,
        name: node.name.toLowerCase(),
        attributes,
        parent,
        children,
        startOffset: location ? location.startOffset : -1,
        endOffset: location ? location.endOffset : -1,
        text: textOf(node.children),
      });

      for (const child of node.children) {
        const childIndex = visit(child, index);
        if (childIndex !== -1) children.push(childIndex);
      }

      Object.freeze(children);
      Object.freeze(attributes);
      return index;
    };

    for (const root of $.root().toArray()) {
      for (const node of root.children) {
        visit(node, -1);
      }
    }

    elements.forEach((element) => Object.freeze(element));
    return new HtmlDocument(source, elements, doctype);
  }

  getElementsByName(name: string): HtmlElement[] {
    const lower = name.toLowerCase();
    return this.elements.filter((e) => e.name === lower);
  }

  /**
   * Elements matching a strict child path such as `['html', 'head', 'base']`
   */
  findByPath(path: readonly string[]): HtmlElement[] {
    if (path.length === 0) return [];
    const [first, ...rest] = path.map((p) => p.toLowerCase());
    let current = this.elements.filter((e) => e.parent === -1 && e.name === first);
    for (const name of rest) {
      current = current.flatMap((e) => e.children.map((i) => this.elements[i]).filter((c) => c.name === name));
    }
    return current;
  }

  getParent(element: HtmlElement): HtmlElement | undefined {
    return element.parent === -1 ? undefined : this.elements[element.parent];
  }

  /**
   * Original markup of the element, or an empty string when the parser gave no location
   */
  getSourceMarkup(element: HtmlElement): string {
    if (element.startOffset < 0 || element.endOffset < 0) return '';
    return this.source.substring(element.startOffset, element.endOffset);
  }
}

function textOf(nodes: readonly AnyNode[]): string {
  let text = '';
  for (const node of nodes) {
    if (isText(node)) {
      text += node.data;
    } else if (isTag(node)) {
      text += textOf(node.children);
    }
  }
  return text;
}
