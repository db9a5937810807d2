export type ProgramRecord = Record<string, unknown>;

export const CONTENT_SEPARATOR = "\n\n----\n\n";

export const MISSING_PROGRAM_ID = "N/A";

const SECTION_DIVIDER = `\n${"-".repeat(60)}\n\n`;

const YEAR_KEYS = ["year_1", "year_2", "year_3", "year_4", "year_5"] as const;

const FOOTER_FIELDS = ["campuses", "languages", "school_type", "field", "program_type", "program_link"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const renderValue = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (value === undefined) {
    return "N/A";
  }
  return JSON.stringify(value);
};

const readField = (record: ProgramRecord, key: string, fallback: string): string => {
  const value = record[key];
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  return renderValue(value);
};

// Intakes are stored per program but the advisor talks about them per year.
const renameIntake = (entry: unknown): unknown => {
  if (!isRecord(entry) || !("program_intake" in entry)) {
    return entry;
  }
  const { program_intake: intake, ...rest } = entry;
  return { ...rest, year_intake: intake };
};

/**
 * Renders a parent program record as the text block handed to grounded
 * generation: a header, one section per year, then the descriptive fields.
 * Year entries without an intake are kept because they still carry prices
 * and campuses.
 */
export function formatProgramForContext(record: ProgramRecord): string {
  const headerLines = [
    `Program: ${readField(record, "program", "Unknown")}`,
    "",
    `School: ${readField(record, "school", "Unknown")}`,
    `School logo: ${readField(record, "school_logo", "N/A")}`,
    `School rank: ${readField(record, "school_rank", "unranked")}`,
    `School accreditations: ${readField(record, "school_accreditations", "[]")}`,
    `Program description: ${readField(record, "program_description", "N/A")}`,
    `Program Id: ${readField(record, "program_id", MISSING_PROGRAM_ID)}`
  ];
  const parts = [headerLines.join("\n")];

  const yearDetails = isRecord(record.year_details) ? record.year_details : {};
  for (const yearKey of YEAR_KEYS) {
    const entries = yearDetails[yearKey];
    if (!Array.isArray(entries) || entries.length === 0) {
      continue;
    }
    parts.push(`${yearKey}: ${JSON.stringify(entries.map(renameIntake))}`);
  }

  const footer = FOOTER_FIELDS.filter((field) => field in record).map(
    (field) => `${field}: ${renderValue(record[field])}`
  );
  if (footer.length > 0) {
    parts.push(footer.join("\n"));
  }

  return parts.join(SECTION_DIVIDER);
}

export const formatContent = (content: readonly string[]): string => content.join(CONTENT_SEPARATOR);
