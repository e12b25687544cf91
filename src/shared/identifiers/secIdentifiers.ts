const CIK_PATTERN = /^\d{1,10}$/;
const ACCESSION_PATTERN = /^\d{10}-\d{2}-\d{6}$/;

/**
 * Returns the CIK without leading zeros, or `null` when the input is not a CIK.
 */
export const normalizeCik = (raw: string): string | null => {
  const trimmed = raw.trim();
  if (!CIK_PATTERN.test(trimmed)) {
    return null;
  }

  const stripped = trimmed.replace(/^0+/, "");
  return stripped.length > 0 ? stripped : null;
};

export const padCik = (cik: string): string => cik.padStart(10, "0");

export const isAccessionNumber = (raw: string): boolean =>
  ACCESSION_PATTERN.test(raw);

const toAccessionPathPart = (accessionNumber: string): string =>
  accessionNumber.replaceAll("-", "");

export const buildArchiveUrl = (
  archivesBaseUrl: string,
  cik: string,
  accessionNumber: string,
  primaryDocument: string,
): string =>
  `${archivesBaseUrl}/${cik}/${toAccessionPathPart(accessionNumber)}/${primaryDocument}`;

/**
 * Splits an EDGAR form type such as "10-K/A" into its base form and amendment flag.
 */
export const describeFormType = (
  formType: string,
): { baseForm: string; isAmendment: boolean } => {
  const isAmendment = formType.endsWith("/A");
  return {
    baseForm: isAmendment ? formType.slice(0, -2) : formType,
    isAmendment,
  };
};
