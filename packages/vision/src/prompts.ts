export const TABLE_SUMMARY_INSTRUCTION =
  "Analyze this image of a financial table. " +
  "Write a comprehensive text summary of its contents: name every column header " +
  "and state the key row labels with their values, so the summary can be matched " +
  "against search queries about any figure in the table. " +
  "Reply with plain text only, without Markdown formatting or code fences.";
