const YES_ANSWERS = ['yes', 'y', 'yeah', 'correct', "that's right", 'right', 'yep', 'yup', 'sure'];
const NO_ANSWERS = ['no', 'n', 'nope'];

// wizard confirm steps accept a few more ways of saying it
const CONFIRM_ANSWERS = [...YES_ANSWERS, 'confirm', 'ok', 'okay', 'go ahead', 'do it', 'absolutely', 'definitely', 'perfect'];
const DECLINE_ANSWERS = [...NO_ANSWERS, 'wait', 'hold on', 'not yet', 'not really'];

const CANCEL_PATTERN =
  /\b(?:cancel|stop|nevermind|never mind|forget it|change my mind|quit|exit|abort|i'm confused|confused)\b/;

function normalize(text: string): string {
  return text.toLowerCase().trim().replace(/[.!]+$/, '');
}

export function isYes(text: string): boolean {
  return YES_ANSWERS.includes(normalize(text));
}

export function isNo(text: string): boolean {
  return NO_ANSWERS.includes(normalize(text));
}

export function isConfirm(text: string): boolean {
  return CONFIRM_ANSWERS.includes(normalize(text));
}

export function isDecline(text: string): boolean {
  return DECLINE_ANSWERS.includes(normalize(text));
}

export function isCancelRequest(text: string): boolean {
  return CANCEL_PATTERN.test(text.toLowerCase());
}

export const FIRST_CANCEL_RESPONSES = [
  "No problem at all! 😊 I've cancelled that. Whenever you're ready, just tell me what you'd like to do.",
  "No worries, that's cancelled. Take your time, I'm here when you need me.",
  "All good, I've stopped there. Is there anything else I can help you with?",
];

export const REPEATED_CANCEL_RESPONSES = [
  "That's cancelled too. It's completely okay to take things one step at a time. Type 'help' if you'd like to see the simplest things to start with.",
  "Cancelled again, and that's fine! If something is confusing, try recording a single expense like 'RM10 for lunch'.",
  "No pressure at all, I've cleared that. Maybe start small: tell me one thing you spent money on today.",
];
