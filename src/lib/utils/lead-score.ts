// Heuristic lead score, always computed server-side

export interface ScorableLead {
  email?: string | null;
  phone?: string | null;
  message?: string | null;
}

const EMAIL_POINTS = 10;
const PHONE_POINTS = 20;
const MESSAGE_POINTS = 10;

const MIN_PHONE_LENGTH = 10;
const LONG_MESSAGE_LENGTH = 80;

// Counts code points, so an accented letter or an emoji is one character.
function characterCount(value: string): number {
  return Array.from(value).length;
}

export function scoreLead({ email, phone, message }: ScorableLead): number {
  let score = 0;
  if (email) {
    score += EMAIL_POINTS;
  }
  if (phone && characterCount(phone) >= MIN_PHONE_LENGTH) {
    score += PHONE_POINTS;
  }
  if (message && characterCount(message) > LONG_MESSAGE_LENGTH) {
    score += MESSAGE_POINTS;
  }
  return score;
}
