import { Parser } from "htmlparser2";

const VOID_LINK = "javascript:void(0)";

const LINK_ATTRIBUTES = new Set(["href", "src", "srcset"]);

/**
 * Resolve a raw attribute value against the page URL.
 * Returns undefined for blank or malformed values.
 */
export function resolveLink(raw: string, base: URL): URL | undefined {
  const value = raw.trim();
  if (!value) return undefined;

  try {
    return new URL(value, base);
  } catch {
    return undefined;
  }
}

function candidates(attribute: string, value: string): string[] {
  if (attribute !== "srcset") return [value];

  // "a.png 1x, b.png 2x": keep the URL part of each candidate.
  return value.split(",").map((item) => item.trim().split(/\s+/)[0] ?? "");
}

function createCollector(base: URL): { parser: Parser; links: Map<string, URL> } {
  const links = new Map<string, URL>();

  const parser = new Parser(
    {
      onopentag(_name, attribs) {
        for (const [attribute, value] of Object.entries(attribs)) {
          if (!LINK_ATTRIBUTES.has(attribute)) continue;

          for (const candidate of candidates(attribute, value)) {
            if (candidate.includes(VOID_LINK)) continue;

            const resolved = resolveLink(candidate, base);
            if (resolved && !links.has(resolved.href)) {
              links.set(resolved.href, resolved);
            }
          }
        }
      },
    },
    { decodeEntities: true, lowerCaseAttributeNames: true }
  );

  return { parser, links };
}

/**
 * Stream an HTML body through the tokenizer and collect every URL found in
 * href, src and srcset attributes of start and self-closing tags.
 *
 * - Resolves relative values against `base`
 * - Drops malformed values and `javascript:void(0)` placeholders
 * - De-dupes by resolved href, in document order
 *
 * No host filtering happens here.
 */
export async function extractLinks(
  body: AsyncIterable<Uint8Array | string>,
  base: URL
): Promise<URL[]> {
  const { parser, links } = createCollector(base);
  const decoder = new TextDecoder();

  for await (const chunk of body) {
    parser.write(
      typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true })
    );
  }

  parser.write(decoder.decode());
  parser.end();

  return Array.from(links.values());
}

export function extractLinksFromHtml(html: string, base: URL): URL[] {
  const { parser, links } = createCollector(base);
  parser.end(html);
  return Array.from(links.values());
}
