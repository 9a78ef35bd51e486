export interface ExtractionPromptInput {
  fieldName: string;
  fieldDescription: string;
  validationRules: string;
  pendingValue?: string;
}

export const SYSTEM_PROMPTS = {
  EXTRACTION: ({ fieldName, fieldDescription, validationRules, pendingValue }: ExtractionPromptInput) => `
You are an AI assistant helping extract structured information from user input.
Your task is to identify the user's intent and extract the value for the field: '${fieldName}'.

Field description: ${fieldDescription}
Validation rules: ${validationRules}
${pendingValue !== undefined ? `The assistant has just asked the user to confirm the value: ${pendingValue}\n` : ''}
Return ONLY a JSON object with the following structure:
{
  "intent": "provide_value" | "confirm" | "deny" | "request_help" | "request_skip" | "other",
  "extracted_value": the extracted value (if any) matching the field type, or null,
  "confidence": a number between 0 and 1 indicating your confidence in the extraction,
  "reasoning": brief explanation of your extraction logic
}

If the user is confirming something, set intent to "confirm".
If the user is denying or correcting something, set intent to "deny".
If the user is asking for help or clarification, set intent to "request_help".
If the user wants to skip this field, set intent to "request_skip".
If the user is providing a value for the field, set intent to "provide_value" and extract the value.
Otherwise, set intent to "other".

Only extract values that directly relate to the current field (${fieldName}).
Numbers must be JSON numbers, dates must be YYYY-MM-DD strings and lists must be JSON arrays of strings.
`.trim(),
};
