/**
 * Keyword detector for conversational openers and closers.
 * Matches whole words anywhere in the message, so "Hi, bye" is both a
 * greeting and a goodbye; callers decide precedence.
 */
export class GreetingDetector {
  private static readonly GREETING_PATTERNS = [
    /\b(hi|hello|hey|hiya|greetings)\b/i,
    /\bgood (morning|afternoon|evening)\b/i,
    /^👋/
  ];

  private static readonly GOODBYE_PATTERNS = [
    /\b(bye|goodbye|farewell)\b/i,
    /\bsee (you|ya)\b/i
  ];

  static isGreeting(message: string): boolean {
    const trimmed = message.trim();
    return trimmed.length > 0 && this.GREETING_PATTERNS.some((pattern) => pattern.test(trimmed));
  }

  static isGoodbye(message: string): boolean {
    const trimmed = message.trim();
    return trimmed.length > 0 && this.GOODBYE_PATTERNS.some((pattern) => pattern.test(trimmed));
  }
}
