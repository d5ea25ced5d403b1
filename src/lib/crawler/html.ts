/**
 * Markup helpers over jsdom. Extraction works on the page source returned by
 * the driver, so the same functions run against live pages and test fixtures.
 */

import { JSDOM } from "jsdom"

const BLOCK_TAGS = new Set([
  "ADDRESS",
  "ARTICLE",
  "DIV",
  "H1",
  "H2",
  "H3",
  "H4",
  "H5",
  "H6",
  "LI",
  "P",
  "SECTION",
  "TABLE",
  "TR",
  "UL",
])

export function parseDocument(html: string): Document {
  return new JSDOM(html).window.document
}

/**
 * Collapse runs of whitespace the way a browser renders inline text.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim()
}

/**
 * Rendered text of an element, whitespace collapsed. Empty string for null.
 */
export function textOf(element: Element | null | undefined): string {
  return element ? normalizeWhitespace(element.textContent ?? "") : ""
}

/**
 * Rendered text split into lines at <br> and block boundaries.
 */
export function textLines(element: Element): string[] {
  const parts: string[] = []

  const walk = (node: Node) => {
    for (const child of Array.from(node.childNodes)) {
      if (child.nodeType === child.TEXT_NODE) {
        parts.push(child.textContent ?? "")
      } else if (child.nodeType === child.ELEMENT_NODE) {
        const tag = child.nodeName.toUpperCase()
        if (tag === "BR") {
          parts.push("\n")
          continue
        }
        const isBlock = BLOCK_TAGS.has(tag)
        if (isBlock) parts.push("\n")
        walk(child)
        if (isBlock) parts.push("\n")
      }
    }
  }

  walk(element)

  return parts
    .join("")
    .split("\n")
    .map(normalizeWhitespace)
    .filter((line) => line.length > 0)
}

/**
 * Nearest preceding sibling element with the given tag name.
 */
export function precedingSibling(element: Element, tagName: string): Element | null {
  const wanted = tagName.toUpperCase()
  let current = element.previousElementSibling
  while (current) {
    if (current.tagName.toUpperCase() === wanted) {
      return current
    }
    current = current.previousElementSibling
  }
  return null
}

/**
 * All digits in a string read as one integer. "12 345 голосов" -> 12345
 */
export function extractInt(text: string): number | null {
  const digits = text.replace(/\D/g, "")
  return digits ? parseInt(digits, 10) : null
}
