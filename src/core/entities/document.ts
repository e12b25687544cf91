export type FilingDocument = {
  url: string;
  contentType: string;
  body: string;
};

export type DocumentLine = {
  text: string;
  page: number;
};

export type DocumentSection = {
  key: string | null;
  title: string;
  text: string;
  startPage: number;
  endPage: number;
};

export type ParsedFilingDocument = {
  lines: DocumentLine[];
  sections: DocumentSection[];
};

export type DocumentMetadata = Record<string, string | null>;

export type StructuredFilingDocument = {
  cik: string;
  accessionNumber: string;
  formType: string;
  filingDate: string;
  reportPeriod: string | null;
  metadata: DocumentMetadata;
  sections: Array<Omit<DocumentSection, "key">>;
};
