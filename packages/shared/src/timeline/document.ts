/**
 * Thin DOM helpers over @xmldom/xmldom for TCX documents.
 */

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { createExportError, errorMessage } from "../errors";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isBlankText(node: Node): boolean {
  return node.nodeType === TEXT_NODE && (node.nodeValue ?? "").trim() === "";
}

/**
 * Parse TCX text. Any XML error is fatal: a half-parsed export would be
 * written out silently otherwise.
 */
export function parseTimeline(xml: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      // mismatched and unclosed end tags only surface as warnings
      warning: (message: string) => {
        problems.push(message);
      },
      error: (message: string) => {
        problems.push(message);
      },
      fatalError: (message: string) => {
        problems.push(message);
      },
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(xml, "text/xml");
  } catch (error) {
    throw createExportError(`Failed to parse XML: ${errorMessage(error)}`, "MALFORMED_PAYLOAD", error);
  }

  if (problems.length > 0 || !document || !document.documentElement) {
    throw createExportError(
      `Failed to parse XML: ${problems[0] ?? "no root element"}`,
      "MALFORMED_PAYLOAD"
    );
  }
  return document;
}

export function childElements(parent: Node): Element[] {
  return Array.from(parent.childNodes).filter(isElement);
}

/**
 * First direct child element with the given local name.
 */
export function childElement(parent: Node, name: string): Element | null {
  return childElements(parent).find((child) => child.localName === name) ?? null;
}

/**
 * Follow a path of direct child elements from the document root.
 */
export function selectPath(document: Document, path: string[]): Element | null {
  let current: Node = document;
  for (const name of path) {
    const next = childElement(current, name);
    if (!next) return null;
    current = next;
  }
  return isElement(current) ? current : null;
}

/**
 * Create an element in the parent's namespace, optionally holding text.
 */
export function createElementFor(parent: Element, name: string, text?: string): Element {
  const element = parent.ownerDocument.createElementNS(parent.namespaceURI, name);
  if (text !== undefined) {
    element.appendChild(parent.ownerDocument.createTextNode(text));
  }
  return element;
}

export function appendElement(parent: Element, name: string, text?: string): Element {
  const element = createElementFor(parent, name, text);
  parent.appendChild(element);
  return element;
}

function indentElement(element: Element, depth: number, unit: string): void {
  if (!childElements(element).length) return;

  const document = element.ownerDocument;
  for (const child of Array.from(element.childNodes)) {
    if (isBlankText(child)) element.removeChild(child);
  }
  for (const child of Array.from(element.childNodes)) {
    element.insertBefore(document.createTextNode(`\n${unit.repeat(depth + 1)}`), child);
    if (isElement(child)) indentElement(child, depth + 1, unit);
  }
  element.appendChild(document.createTextNode(`\n${unit.repeat(depth)}`));
}

/**
 * Re-indent the whole tree. Whitespace-only text between elements is
 * replaced; text content of leaf elements is kept as is.
 */
export function indentTimeline(document: Document, spaces: number = 2): void {
  if (document.documentElement) {
    indentElement(document.documentElement, 0, " ".repeat(spaces));
  }
}

/**
 * Serialize the document, one top-level node (declaration, root) per line.
 */
export function serializeTimeline(document: Document): string {
  const serializer = new XMLSerializer();
  try {
    const parts = Array.from(document.childNodes)
      .filter((node) => !isBlankText(node))
      .map((node) => serializer.serializeToString(node));
    return `${parts.join("\n")}\n`;
  } catch (error) {
    throw createExportError(`Failed to write XML to string: ${errorMessage(error)}`, "SERIALIZATION", error);
  }
}
