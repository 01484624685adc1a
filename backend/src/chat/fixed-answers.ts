import { ConversationSettings } from '../config/conversation-settings.service';

export const greetingAnswer = (settings: ConversationSettings) =>
  `Hello! Welcome to ${settings.propertyName}. I can help with cottages, facilities, pricing, location and bookings. What would you like to know?`;

export const HELP_ANSWER = [
  'I can answer questions about:',
  '- The cottages and how many guests each one sleeps',
  '- Facilities such as the kitchen, parking and heating',
  '- Prices for your dates and group size',
  '- Location, nearby attractions and directions',
  '- Availability and the booking process',
  '',
  'Just ask, for example "How much is cottage 9 for 3 nights?"',
].join('\n');

export const AFFIRMATIVE_FOLLOW_UP = 'Great! What else would you like to know?';

export const AFFIRMATIVE_ANSWER = "Great! Let me know if there's anything else I can help with.";

export const NEGATIVE_FOLLOW_UP = 'No problem. Enjoy your day, and feel free to come back any time!';

export const NEGATIVE_ANSWER = 'No problem. Is there anything else you would like to know?';

export const STATEMENT_ANSWER = "You're welcome! Feel free to ask if you have any other questions.";

export const clarificationAnswer = (question: string) =>
  `To give you the most accurate answer, could you please clarify: **${question}**`;

export const noDocumentsAnswer = (settings: ConversationSettings) =>
  [
    "I couldn't find specific information about that in our knowledge base.",
    '',
    '**Please try:**',
    `- Rephrasing your question (e.g., "What is ${settings.propertyName}?")`,
    '- Using different keywords',
    `- Being more specific about ${settings.propertyName}`,
    '',
    '**Note:** I only answer from the property documents, not from general knowledge.',
  ].join('\n');

export const outOfScopeAnswer = (settings: ConversationSettings, question: string, reason: string) =>
  [
    "**I don't have information about that in the knowledge base.**",
    '',
    `**Your question:** ${question}`,
    '',
    `**Issue:** ${reason}`,
    '',
    `**Note:** I only have information about ${settings.propertyName}. I cannot answer questions about other locations or general knowledge.`,
    '',
    '**Try asking about:**',
    `- ${settings.propertyName} and its cottages`,
    '- Facilities, pricing and availability',
    '- Location and nearby attractions',
  ].join('\n');

export interface AnswerFrame {
  prefix: string;
  suffix: string;
}

export const bookingAcknowledgment = (settings: ConversationSettings): AnswerFrame => ({
  prefix: [
    "I understand you'd like to book a cottage!",
    '',
    "While I can't process bookings directly, I can give you everything you need to make one.",
    '',
    "**Here's what I found about booking:**",
    '',
    '',
  ].join('\n'),
  suffix: [
    '',
    '',
    '**To proceed with booking, you can:**',
    `- Book online: ${settings.contactUrl}`,
    `- Call the cottage manager: ${settings.contactPhone}`,
    '- Ask me about availability, pricing or anything else you need',
  ].join('\n'),
});
