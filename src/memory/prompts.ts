/**
 * Prompt templates for the memory summary agent
 */

export type TranscriptLabels = {
  userLabel: string;
  assistantLabel: string;
};

export function buildTopicPrompt(userQuotes: string, maxChars: number): string {
  return [
    "Read the following messages from one conversation and name its topic.",
    "Rules:",
    "1. Follow the whole conversation and list every main subject, separated by commas.",
    "2. Be specific (\"travel advice\" rather than \"weather\" when the user asked what to wear outside).",
    "3. Only name subjects that were actually discussed.",
    `4. Answer with the topic only, at most ${maxChars} characters.`,
    "",
    "Messages:",
    userQuotes,
    "",
    "Topic:",
  ].join("\n");
}

export function buildContextPrompt(conversationText: string): string {
  return [
    "Summarise the following conversation as short running context.",
    "Rules:",
    "1. Go through the rounds in order.",
    "2. Keep concrete facts such as names, places, figures and file paths.",
    "3. Do not add anything that was not said.",
    "4. Write between 80 and 200 characters.",
    "",
    "Conversation:",
    conversationText,
    "",
    "Summary:",
  ].join("\n");
}

export function buildRoundPrompt(
  roundText: string,
  roundNumber: number,
  labels: TranscriptLabels,
  maxChars: number,
): string {
  return [
    `Condense round ${roundNumber} of a conversation into a short transcript.`,
    "Rules:",
    `1. Keep the format "${labels.userLabel}: ..." followed by "${labels.assistantLabel}: ...".`,
    "2. Keep concrete facts such as names, places, figures, code languages and file paths.",
    "3. Use clipped sentences but keep every key detail of the answer.",
    "4. Do not add anything that was not said.",
    `5. Stay within ${maxChars} characters.`,
    "",
    "Round:",
    roundText,
    "",
    "Condensed transcript:",
  ].join("\n");
}
