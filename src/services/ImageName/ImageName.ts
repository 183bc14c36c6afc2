export type ParsedImageInfo = {
  /** 查詢影像取自檔名；衛星影像由座標組成 */
  identifier: string;
  latitude: number;
  longitude: number;
  /** 格式 A 視為查詢影像，格式 B 視為參考（衛星）影像 */
  isQuery: boolean;
  /** 含前導 "."，保留原大小寫；沒有副檔名時為空字串 */
  extension: string;
};

export type ParseError = { type: "UNRECOGNIZED_FORMAT"; message: string };
