// アダプタが返す生の検索結果。欠損値の補完・検証は正規化側で行う
export interface RawResult {
  title?: string;
  link?: string;
  summary?: string;
  image?: string;
  publishedAt?: string | Date;
  sourceName: string;
}

export interface FetchResult<T = RawResult> {
  source: string;
  results: T[];
  errors: string[];
}

// ソースアダプタの共通インターフェース
// 結果が0件でも例外は投げない
export interface SourceAdapter<T = RawResult> {
  readonly name: string;
  fetch(): Promise<FetchResult<T>>;
}
