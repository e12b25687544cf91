import * as cheerio from "cheerio";
import type {
  DocumentLine,
  DocumentSection,
  FilingDocument,
  ParsedFilingDocument,
} from "../../core/entities/document";

const PAGE_BREAK = "\f";

const BLOCK_SELECTOR = [
  "p",
  "div",
  "tr",
  "li",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "table",
  "section",
  "article",
  "blockquote",
  "pre",
  "center",
].join(", ");

const HIDDEN_SELECTOR = [
  "head",
  "script",
  "style",
  "noscript",
  "ix\\:header",
  '[style*="display:none"]',
  '[style*="display: none"]',
].join(", ");

const MAX_HEADING_LENGTH = 150;
const ITEM_HEADING_PATTERN = /^item\s+(\d{1,2}[a-z]?)(\s*[.:\-–—])?\s*(.*)$/i;
const PART_HEADING_PATTERN = /^part\s+(iv|i{1,3})\b(\s*[.:\-–—])?\s*(.*)$/i;
const SENTENCE_BREAK_PATTERN = /[.!?]\s+\S/;
const TITLE_START_PATTERN = /^[A-Z(]/;
const HTML_MARKER_PATTERN = /<(html|body|div|p|table)[\s>]/i;

const normalizeLine = (line: string): string =>
  line.replace(/\s+/g, " ").trim();

const isHtmlDocument = (document: FilingDocument): boolean =>
  document.contentType.toLowerCase().includes("html") ||
  HTML_MARKER_PATTERN.test(document.body);

/**
 * Splits raw text into pages on form feeds, then into normalized non-empty lines.
 */
const toLines = (raw: string): DocumentLine[] => {
  const lines: DocumentLine[] = [];

  raw.split(PAGE_BREAK).forEach((pageText, index) => {
    for (const rawLine of pageText.split(/\r?\n/)) {
      const text = normalizeLine(rawLine);
      if (text) {
        lines.push({ text, page: index + 1 });
      }
    }
  });

  return lines;
};

const htmlToRawText = (html: string): string => {
  const $ = cheerio.load(html);

  $(HIDDEN_SELECTOR).remove();
  $("br").replaceWith("\n");
  $("td, th").append(" ");
  $('[style*="page-break-before"]').before(`\n${PAGE_BREAK}\n`);
  $('hr, [style*="page-break-after"]').after(`\n${PAGE_BREAK}\n`);
  $(BLOCK_SELECTOR).append("\n");

  return $.root().text();
};

/**
 * Converts a filing document (HTML or plain text) into normalized, page-aware lines.
 */
export const extractLines = (document: FilingDocument): DocumentLine[] =>
  toLines(
    isHtmlDocument(document) ? htmlToRawText(document.body) : document.body,
  );

export const linesToText = (lines: DocumentLine[]): string =>
  lines.map((line) => line.text).join("\n");

type SectionDraft = {
  key: string | null;
  title: string;
  body: string[];
  startPage: number;
  endPage: number;
};

/**
 * "Item 1A of this report..." is prose: a title needs a separator or a capitalised first word,
 * and never runs past one sentence.
 */
const isHeadingTitle = (separator: string | undefined, title: string) =>
  !SENTENCE_BREAK_PATTERN.test(title) &&
  (separator !== undefined || title === "" || TITLE_START_PATTERN.test(title));

const matchHeading = (text: string): { key: string | null } | null => {
  if (text.length > MAX_HEADING_LENGTH) {
    return null;
  }

  const itemMatch = ITEM_HEADING_PATTERN.exec(text);
  if (itemMatch && isHeadingTitle(itemMatch[2], itemMatch[3] ?? "")) {
    return { key: `Item ${(itemMatch[1] ?? "").toUpperCase()}.` };
  }

  const partMatch = PART_HEADING_PATTERN.exec(text);
  if (partMatch && isHeadingTitle(partMatch[2], partMatch[3] ?? "")) {
    return { key: null };
  }

  return null;
};

const toSection = (draft: SectionDraft): DocumentSection => ({
  key: draft.key,
  title: draft.title,
  text: draft.body.join("\n"),
  startPage: draft.startPage,
  endPage: draft.endPage,
});

/**
 * Groups lines under "Item N." and "PART N" headings.
 * A repeated item key (table of contents, then body) keeps its longest occurrence.
 */
export const buildSections = (lines: DocumentLine[]): DocumentSection[] => {
  const firstLine = lines[0];
  const lastLine = lines.at(-1);
  if (!firstLine || !lastLine) {
    return [];
  }

  const drafts: SectionDraft[] = [];
  let current: SectionDraft = {
    key: null,
    title: "Cover",
    body: [],
    startPage: firstLine.page,
    endPage: firstLine.page,
  };
  let sawHeading = false;

  for (const line of lines) {
    const heading = matchHeading(line.text);
    if (heading) {
      if (sawHeading || current.body.length > 0) {
        drafts.push(current);
      }
      sawHeading = true;
      current = {
        key: heading.key,
        title: line.text,
        body: [],
        startPage: line.page,
        endPage: line.page,
      };
      continue;
    }

    current.body.push(line.text);
    current.endPage = line.page;
  }
  drafts.push(current);

  if (!sawHeading) {
    return [
      {
        key: null,
        title: "Document",
        text: linesToText(lines),
        startPage: firstLine.page,
        endPage: lastLine.page,
      },
    ];
  }

  const sections: DocumentSection[] = [];
  const positionByKey = new Map<string, number>();

  for (const draft of drafts) {
    const section = toSection(draft);
    if (section.key === null) {
      sections.push(section);
      continue;
    }

    const position = positionByKey.get(section.key);
    if (position === undefined) {
      positionByKey.set(section.key, sections.length);
      sections.push(section);
      continue;
    }

    const existing = sections[position];
    if (existing && section.text.length > existing.text.length) {
      sections[position] = section;
    }
  }

  return sections;
};

export const parseFilingDocument = (
  document: FilingDocument,
): ParsedFilingDocument => {
  const lines = extractLines(document);
  return { lines, sections: buildSections(lines) };
};
