export type StrengthScore = 0 | 1 | 2 | 3 | 4;

const WEAK_PATTERNS = ["password", "123", "abc"];
const SYMBOL = /[!@#$%^&*(),.?":{}|<>]/;

/** Advisory 0..4 score for UI feedback. Not a security guarantee. */
export function scorePassword(password: string): StrengthScore {
  let score = 0;
  if (password.length >= 8) score++;
  if (password.length >= 12) score++;
  if (/[a-z]/.test(password) && /[A-Z]/.test(password)) score++;
  if (/\d/.test(password)) score++;
  if (SYMBOL.test(password)) score++;

  const lower = password.toLowerCase();
  for (const p of WEAK_PATTERNS) if (lower.includes(p)) score--;

  return clamp(score);
}

export function describeStrength(score: StrengthScore): string {
  switch (score) {
    case 0:
    case 1:
      return "Very Weak";
    case 2:
      return "Weak";
    case 3:
      return "Good";
    case 4:
      return "Strong";
  }
}

function clamp(n: number): StrengthScore {
  if (n <= 0) return 0;
  if (n === 1) return 1;
  if (n === 2) return 2;
  if (n === 3) return 3;
  return 4;
}
