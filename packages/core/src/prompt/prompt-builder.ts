export interface ExtractionPromptInput {
  /** Full text of the document */
  documentText: string;
  /** Literal JSON structure to fill in; omit to let the model choose one */
  template?: string;
}

const PREAMBLE = `You are an assistant specialised in extracting data from documents and structuring it as JSON.
Analyse the following text and extract the key information.`;

const TEMPLATE_RULES = `IMPORTANT RULES:
1. **Exact Structure**: Your answer MUST follow the JSON structure defined below exactly. Do not add or remove keys.
2. **Data Types**: Respect the data types given (string, number). Do not quote numbers.
3. **Missing Data**: If a piece of information is not in the text, use the value \`null\` for its key (not the string "null").
4. **Date Format**: Where dates are requested, format them as YYYY-MM-DD if possible.`;

const FREE_RULES = `IMPORTANT RULES:
1. **Create a Logical Structure**: Define a clear, hierarchical JSON structure that organises the document's information sensibly.
2. **Missing Data**: If a piece of information is not in the text, use the value \`null\` for its key.
3. **Date Format**: Where possible, format dates as YYYY-MM-DD.`;

const CLEAN_ANSWER_RULE =
  '5. **Clean Answer**: Your answer must contain ONLY the JSON code. Do not include explanations, comments or ```json fences.';

/**
 * Build the instruction prompt for one document.
 *
 * Output depends only on the input, so reruns send identical requests.
 */
export function buildExtractionPrompt(input: ExtractionPromptInput): string {
  const hasTemplate = input.template !== undefined;
  const sections = [PREAMBLE, hasTemplate ? TEMPLATE_RULES : FREE_RULES, CLEAN_ANSWER_RULE];

  if (hasTemplate) {
    sections.push(`---\nJSON STRUCTURE TO FILL IN:\n${input.template}\n---`);
  }

  sections.push(`DOCUMENT TEXT TO ANALYSE:\n${input.documentText}\n---`);

  return sections.join('\n\n');
}
