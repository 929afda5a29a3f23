import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ErrorCode, WordclassError } from "../errors/types.js";

const TEXT_KEY = "#text";
const ATTRIBUTES_KEY = ":@";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: false,
  textNodeName: TEXT_KEY,
});

type OrderedNode = Record<string, unknown>;

function isNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function children(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Concatenated text of a node list, like a DOM element's innerText.
 */
function innerText(nodes: unknown[]): string {
  let text = "";
  for (const node of nodes) {
    if (!isNode(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === TEXT_KEY) {
        text += String(value);
      } else if (key !== ATTRIBUTES_KEY) {
        text += innerText(children(value));
      }
    }
  }
  return text;
}

function findFirst(nodes: unknown[], tag: string): unknown[] | undefined {
  for (const node of nodes) {
    if (!isNode(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === TEXT_KEY || key === ATTRIBUTES_KEY) continue;
      if (key === tag) {
        return children(value);
      }
      const nested = findFirst(children(value), tag);
      if (nested !== undefined) {
        return nested;
      }
    }
  }
  return undefined;
}

/**
 * Text of the first element named `tag` at any depth, in document order.
 *
 * @returns The element's text, or null if no such element exists
 * @throws WordclassError LOOKUP_INVALID_RESPONSE if `xml` is not well-formed
 */
export function findFirstElementText(xml: string, tag: string): string | null {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new WordclassError(
      `Dictionary response is not valid XML: ${validation.err.msg}`,
      ErrorCode.LOOKUP_INVALID_RESPONSE,
      { context: { line: validation.err.line, col: validation.err.col } }
    );
  }

  const document: unknown = parser.parse(xml);
  const element = findFirst(children(document), tag);
  return element === undefined ? null : innerText(element);
}
