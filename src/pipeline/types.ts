// アーカイブに保存する正規化済みの記事。link が同一性キーを兼ねる
export interface Item {
  title: string;
  link: string;
  summary?: string;
  image?: string;
  source: string;
  date: string;                  // YYYY-MM-DD HH:MM:SS (UTC)
}

export interface FacetLabels {
  topics: string[];
  disciplines: string[];
  areas: string[];
}

// items.json / latest.json に出力する形。ファセットと新着フラグは毎回再計算する
export interface PublishedItem extends Item, FacetLabels {
  is_new: boolean;
}
