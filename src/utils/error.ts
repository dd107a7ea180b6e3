// 任意の例外値をログ出力用の文字列に変換する
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
