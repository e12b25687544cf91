const MARKDOWN_FORMAT =
  "Format the response strictly in Markdown using headings (##, ###), bullet points (-), and bold important values. Do not add introductory or concluding text.";

const ANALYST_ROLE =
  "You are a financial analyst specializing in SEC filings analysis.";

const focusList = (items: string[]): string =>
  items.map((item, index) => `${index + 1}. ${item}`).join("\n");

const formPrompt = (subject: string, focus: string[]): string =>
  [
    ANALYST_ROLE,
    `Your task is to analyze ${subject} and provide a concise but comprehensive analysis in Markdown format that highlights the most important aspects. Focus on:`,
    focusList(focus),
    MARKDOWN_FORMAT,
  ].join("\n");

const sectionPrompt = (
  section: string,
  formType: string,
  focus: string[],
): string =>
  [
    `Analyze the ${section} section of this ${formType} filing. Focus on:`,
    focusList(focus),
    MARKDOWN_FORMAT,
  ].join("\n");

const SYSTEM_PROMPTS: Record<string, string> = {
  "10-K": formPrompt("the provided section from a 10-K filing", [
    "Key business developments and changes",
    "Financial performance and metrics",
    "Risk factors and their implications",
    "Management's discussion of operations",
    "Material changes in financial condition",
  ]),
  "10-Q": formPrompt("the provided section from a 10-Q filing", [
    "Quarterly financial performance",
    "Changes in financial condition",
    "Significant events or developments",
    "Management's discussion of quarterly results",
    "Forward-looking statements",
  ]),
  "8-K": formPrompt("the provided 8-K filing", [
    "The nature of the material event",
    "Impact on the company",
    "Timing and significance",
    "Related disclosures",
    "Market implications",
  ]),
  PX14A6N: formPrompt("the provided PX14A6N filing", [
    "The nature of the material event",
    "Who is the filer and what is their history",
    "Impact on the company",
    "Timing and significance",
    "Related disclosures",
    "Market implications",
    "Whether shareholders of the company should be concerned",
  ]),
};

const DEFAULT_SYSTEM_PROMPT = formPrompt("the provided SEC filing content", [
  "Key information and disclosures",
  "Material events or changes",
  "Financial implications",
  "Business impact",
  "Notable developments",
]);

const SECTION_PROMPTS: Record<string, Record<string, string>> = {
  "10-K": {
    business_overview: sectionPrompt("business overview", "10-K", [
      "Company's business model and operations",
      "Key products or services",
      "Market position and competition",
      "Business segments and their performance",
      "Recent business developments",
    ]),
    financial_metrics: sectionPrompt("financial metrics", "10-K", [
      "Key financial ratios and metrics",
      "Year-over-year changes",
      "Financial health indicators",
      "Performance trends",
      "Notable financial developments",
    ]),
    risk_factors: sectionPrompt("risk factors", "10-K", [
      "Major risk categories",
      "New or increased risks",
      "Risk mitigation strategies",
      "Industry-specific risks",
      "Potential impact on business",
    ]),
    management_discussion: sectionPrompt("management discussion", "10-K", [
      "Management's view of business performance",
      "Key operational metrics",
      "Strategic initiatives",
      "Market conditions and their impact",
      "Future outlook and guidance",
    ]),
  },
  "10-Q": {
    financial_statements: sectionPrompt("financial statements", "10-Q", [
      "Quarterly financial performance",
      "Key financial metrics",
      "Changes in financial position",
      "Significant transactions",
      "Comparison with previous quarters",
    ]),
    management_discussion: sectionPrompt("management discussion", "10-Q", [
      "Quarterly business performance",
      "Key operational metrics",
      "Market conditions",
      "Recent developments",
      "Forward-looking statements",
    ]),
  },
};

export const getSystemPrompt = (formType: string): string =>
  SYSTEM_PROMPTS[formType] ?? DEFAULT_SYSTEM_PROMPT;

/**
 * Section prompts exist for 10-K and 10-Q groups; anything else gets the form's system prompt.
 */
export const getSectionPrompt = (
  formType: string,
  sectionName: string,
): string =>
  SECTION_PROMPTS[formType]?.[sectionName] ?? getSystemPrompt(formType);
