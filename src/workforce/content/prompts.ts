export const EMAIL_SYSTEM_PROMPT = `You are a corporate email writer generating realistic internal business emails.
Write natural-sounding emails that an employee would send during their work day.
Keep emails concise (2-5 sentences for the body).
Include appropriate greetings and sign-offs.
Do not include any markers, tags, or metadata - just the email content.`;

const DEPARTMENT_TOPICS: Record<string, string> = {
  engineering: "about a code review, sprint update, or technical decision",
  sales: "about a client meeting, deal progress, or quarterly targets",
  hr: "about a policy update, onboarding, or team event",
  finance: "about budget review, expense report, or financial planning",
  operations: "about process improvement, vendor coordination, or logistics",
  executive: "about strategic initiative, board preparation, or organizational update",
};

export function buildMessagePrompt(
  department: string,
  workerName: string,
  directive?: string | null,
): string {
  let prompt = `Write a short internal business email from ${workerName} in the ${department} department.`;
  const trimmedDirective = directive?.trim();
  if (trimmedDirective) {
    prompt += `\n\nAdditional context: ${trimmedDirective}`;
  } else {
    const topic = DEPARTMENT_TOPICS[department.toLowerCase()] ?? "about a work-related topic";
    prompt += `\nThe email should be ${topic}.`;
  }
  prompt +=
    "\n\nReturn ONLY the email content (subject line on first line, then body). No other text.";
  return prompt;
}
