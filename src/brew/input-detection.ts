// Lines containing any of these (case-insensitive) mean brew is waiting on a human.
export const INPUT_PROMPT_PATTERNS: readonly string[] = [
  "y/n",
  "(y/n)",
  "[y/n]",
  "yes/no",
  "(yes/no)",
  "[yes/no]",
  "press enter",
  "continue?",
  "proceed?",
  "password:",
  "passphrase:",
  "are you sure",
  "do you want",
  "would you like",
];

export function isWaitingForInput(line: string): boolean {
  const lower = line.toLowerCase();
  return INPUT_PROMPT_PATTERNS.some((pattern) => lower.includes(pattern));
}
