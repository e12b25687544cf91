export type SectionAnalysis = {
  sectionName: string;
  analysis: string;
};

export type FilingAnalysis = {
  cik: string;
  accessionNumber: string;
  formType: string;
  filingDate: string;
  model: string;
  sectionAnalyses: SectionAnalysis[];
};
