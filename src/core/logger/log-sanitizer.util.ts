/**
 * 日志脱敏工具类
 * 用于在日志输出前对令牌、密码等敏感内容进行掩码处理
 */
export class LogSanitizer {
  private static readonly MASK = '***';

  // Authorization: Bearer xxx
  private static readonly BEARER_PATTERN = /\b(Bearer\s+)[A-Za-z0-9\-._~+/]+=*/gi;

  // 三段式 JWT（header 一定以 eyJ 开头）
  private static readonly JWT_PATTERN = /\beyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*/g;

  // "password":"xxx" / password=xxx
  private static readonly PASSWORD_PATTERN = /("?password"?\s*[:=]\s*)("[^"]*"|[^\s,&}]+)/gi;

  /**
   * 对一行日志文本进行脱敏
   */
  static maskSecrets(text: string): string {
    if (!text) {
      return text;
    }

    return text
      .replace(this.BEARER_PATTERN, `$1${this.MASK}`)
      .replace(this.JWT_PATTERN, this.MASK)
      .replace(this.PASSWORD_PATTERN, (_match, prefix: string, value: string) =>
        value.startsWith('"') ? `${prefix}"${this.MASK}"` : `${prefix}${this.MASK}`,
      );
  }

  /**
   * 对字符串进行掩码处理（保留前后若干位）
   * @param prefixLen 保留前缀长度
   * @param suffixLen 保留后缀长度
   */
  static maskString(str: string, prefixLen: number, suffixLen: number): string {
    if (!str || str.length <= prefixLen + suffixLen) {
      return this.MASK;
    }

    const prefix = str.substring(0, prefixLen);
    const suffix = suffixLen > 0 ? str.substring(str.length - suffixLen) : '';
    const maskedLength = str.length - prefixLen - suffixLen;
    const mask = '*'.repeat(Math.min(maskedLength, 8)); // 最多显示8个星号

    return `${prefix}${mask}${suffix}`;
  }
}
