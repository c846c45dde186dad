export const ENHANCEMENT_SYSTEM_PROMPT =
  'You are an expert at extracting structured data from LinkedIn posts. Return CSV only.';

export function buildEnhancementPrompt(recordsTable: string): string {
  return `Below is CSV data extracted from LinkedIn posts, with the columns Name,Title,Period,Details.

For every row:
1. Add a column "ID" with a unique row identifier (1, 2, 3, ...).
2. Add a column "Company" with the company the person works for or is hiring for. Derive it ONLY from the Name or Title columns, never from Details. If it cannot be determined, write "N/A".
3. Add a column "Location" derived ONLY from the Details column:
   - write Remote if the role is likely remote,
   - otherwise write the specific place in double quotes, for example "Berlin, Germany",
   - otherwise write Location not specified.

Return exactly the same number of rows as the input, in the same order, keyed by Name.
Return CSV with exactly these columns: ID,Name,Company,Location
Do not include the Title, Period or Details columns in your answer. Do not add any explanation.

CSV data:
${recordsTable}
`;
}
