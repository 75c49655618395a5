/**
 * Extraction prompt.
 */

import type { EmailContent } from "./types.js";

export const SYSTEM_PROMPT = "You are a financial expense parser. Return only valid JSON.";

export function buildExtractionPrompt(email: EmailContent): string {
  const sender = email.sender !== undefined ? `EMAIL SENDER: ${email.sender}\n` : "";

  return `You are an expert at reading emails and extracting shared expenses for financial tracking.

Parse the following email:

${sender}EMAIL SUBJECT: ${email.subject}
EMAIL BODY: ${email.body}

Return a single JSON object with this shape:
{
  "expense": {
    "description": "Brief description of the expense",
    "amount": "total amount as a decimal number",
    "currency": "3-letter currency code, or null if not mentioned",
    "date": "YYYY-MM-DD if mentioned, null otherwise",
    "category": "expense category if apparent (e.g. 'Groceries', 'Taxi', 'Dining out'), null otherwise",
    "participants": ["names or emails of the people sharing the expense"],
    "splitPolicy": "equal | exact | percentage (default: equal)",
    "payer": "name or email of who paid, null if not mentioned"
  },
  "confidence": 0.0-1.0,
  "notes": "Ambiguities or assumptions, null if none",
  "summary": "One short sentence describing the expense"
}

Guidelines:
1. Use the total amount actually paid; ignore taxes and tips unless they are part of the total
2. List everyone mentioned as sharing the cost in participants, the sender included only if named
3. Keywords such as "split", "share", "owe" and "paid" identify participants and the payer
4. Use "equal" unless specific amounts or percentages are given
5. If the email is clearly not about an expense, set confidence to 0.0
6. Be conservative: use confidence above 0.8 only when the information is very clear

Return ONLY the JSON object, no additional text.`;
}
