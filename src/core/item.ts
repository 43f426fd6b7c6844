import { classifyContent, type ContentType } from "./detect";
import { describeContent, previewContent } from "./describe";
import { renderFragment } from "./render";
import { errorMessage } from "./errors";

export interface ContentItem {
  readonly identifier: string;
  readonly bytes: Uint8Array;
  readonly type: ContentType;
  readonly subtype: string;
  readonly description: string;
  readonly preview: string;
  /** Decoded text; empty for images. */
  readonly text: string;
}

export type ContentSource =
  | { identifier: string; bytes: Uint8Array }
  | { identifier: string; read: () => Uint8Array };

export interface ProcessedItem {
  item: ContentItem;
  fragment: string;
}

export interface ItemFailure {
  identifier: string;
  error: string;
}

export interface ProcessResult {
  items: ProcessedItem[];
  failures: ItemFailure[];
}

/** Classify, describe and preview one blob in a single pass. */
export function createContentItem(identifier: string, bytes: Uint8Array): ContentItem {
  const detected = classifyContent(bytes);
  return Object.freeze({
    identifier,
    bytes,
    type: detected.type,
    subtype: detected.subtype,
    description: describeContent(detected, detected.text),
    preview: previewContent(detected.type, detected.text),
    text: detected.text,
  });
}

function sourceBytes(source: ContentSource): Uint8Array {
  return "bytes" in source ? source.bytes : source.read();
}

export function byIdentifier(a: { identifier: string }, b: { identifier: string }): number {
  if (a.identifier < b.identifier) return -1;
  return a.identifier > b.identifier ? 1 : 0;
}

/** Item and fragment for one source; throws when the source cannot be read. */
export function processItem(source: ContentSource): ProcessedItem {
  const item = createContentItem(source.identifier, sourceBytes(source));
  return { item, fragment: renderFragment(item) };
}

/**
 * Build items and fragments for every source. A source that fails to read or
 * render is reported in `failures`; the rest still get processed.
 */
export function processItems(sources: Iterable<ContentSource>): ProcessResult {
  const items: ProcessedItem[] = [];
  const failures: ItemFailure[] = [];

  for (const source of sources) {
    try {
      items.push(processItem(source));
    } catch (err) {
      failures.push({ identifier: source.identifier, error: errorMessage(err) });
    }
  }

  items.sort((a, b) => byIdentifier(a.item, b.item));
  return { items, failures };
}
