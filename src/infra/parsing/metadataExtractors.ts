import type {
  DocumentLine,
  DocumentMetadata,
} from "../../core/entities/document";
import { findDateInText } from "./dateUtils";

const REGISTRANT_MARKER = /exact name of registrant/i;

/**
 * Reads cover-page facts from parsed filing lines. Subclasses pick the facts per form type.
 */
export abstract class MetadataExtractor {
  constructor(protected readonly lines: DocumentLine[]) {}

  abstract extract(): DocumentMetadata;

  /**
   * The registrant name sits on the line above the "(Exact name of registrant ...)" caption.
   */
  protected findRegistrantName(): string | null {
    const markerIndex = this.lines.findIndex((line) =>
      REGISTRANT_MARKER.test(line.text),
    );
    if (markerIndex <= 0) {
      return null;
    }

    return this.lines[markerIndex - 1]?.text ?? null;
  }

  /**
   * Looks for a date after the label, then on the following line, then on the preceding one.
   */
  protected findDate(label: RegExp): string | null {
    for (let index = 0; index < this.lines.length; index += 1) {
      const text = this.lines[index]?.text ?? "";
      const match = label.exec(text);
      if (!match) {
        continue;
      }

      const candidates = [
        text.slice(match.index + match[0].length),
        this.lines[index + 1]?.text ?? "",
        this.lines[index - 1]?.text ?? "",
      ];

      for (const candidate of candidates) {
        const date = findDateInText(candidate);
        if (date) {
          return date;
        }
      }
    }

    return null;
  }
}

export class AnnualReportExtractor extends MetadataExtractor {
  extract(): DocumentMetadata {
    return {
      companyName: this.findRegistrantName(),
      reportPeriod: this.findDate(/for the fiscal year ended/i),
    };
  }
}

class QuarterlyReportExtractor extends MetadataExtractor {
  extract(): DocumentMetadata {
    return {
      companyName: this.findRegistrantName(),
      reportPeriod: this.findDate(/for the quarterly period ended/i),
    };
  }
}

class CurrentReportExtractor extends MetadataExtractor {
  extract(): DocumentMetadata {
    return {
      companyName: this.findRegistrantName(),
      eventDate: this.findDate(/date of report/i),
    };
  }
}

export class DefaultExtractor extends MetadataExtractor {
  extract(): DocumentMetadata {
    return {
      title: this.lines[0]?.text ?? null,
      note: "fallback extractor - key fields may be missing",
    };
  }
}

type ExtractorConstructor = new (lines: DocumentLine[]) => MetadataExtractor;

const EXTRACTORS_BY_FORM: Record<string, ExtractorConstructor> = {
  "10-K": AnnualReportExtractor,
  "10-Q": QuarterlyReportExtractor,
  "8-K": CurrentReportExtractor,
};

/**
 * Picks the extractor for a base form type; `isFallback` marks forms without a dedicated one.
 */
export const selectMetadataExtractor = (
  baseForm: string,
  lines: DocumentLine[],
): { extractor: MetadataExtractor; isFallback: boolean } => {
  const Extractor = EXTRACTORS_BY_FORM[baseForm];
  if (!Extractor) {
    return { extractor: new DefaultExtractor(lines), isFallback: true };
  }

  return { extractor: new Extractor(lines), isFallback: false };
};
