import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { floatRepr } from "./FloatText";
import type { ParseError, ParsedImageInfo } from "./ImageName";

/** 格式 A：<id>,<lat>,<lon>, 之後的內容忽略 */
export const queryNameRegex = /^([^,]+),(-?\d+\.?\d*),(-?\d+\.?\d*),/;

/** 格式 B：satellite_<lat>_<lon>，必須整段相符 */
export const satelliteNameRegex = /^satellite_(-?\d+\.?\d*)_(-?\d+\.?\d*)$/;

/**
 * 解析檔名。兩種格式都不符合時回傳 UNRECOGNIZED_FORMAT，由呼叫端略過該檔。
 *
 * 例如：
 *   JJ8TdU5_UQg,37.788169,-122.400728,.jpg → 查詢影像，id=JJ8TdU5_UQg
 *   satellite_37.7881_-122.4007.png       → 參考影像，id=377881_n1224007
 */
export function parseImageName(
  fileName: string
): Result<ParsedImageInfo, ParseError> {
  const extension = path.extname(fileName);
  const baseName = fileName.slice(0, fileName.length - extension.length);

  const query = queryNameRegex.exec(baseName);
  if (query) {
    return ok({
      identifier: query[1],
      latitude: Number(query[2]),
      longitude: Number(query[3]),
      isQuery: true,
      extension,
    });
  }

  const satellite = satelliteNameRegex.exec(baseName);
  if (satellite) {
    const latitude = Number(satellite[1]);
    const longitude = Number(satellite[2]);
    return ok({
      identifier: coordinateIdentifier(latitude, longitude),
      latitude,
      longitude,
      isQuery: false,
      extension,
    });
  }

  return err({
    type: "UNRECOGNIZED_FORMAT",
    message: `檔名不符合任何已知格式: ${fileName}`,
  });
}

/**
 * 由座標組出識別碼：移除小數點，負號改成 n。
 */
export function coordinateIdentifier(latitude: number, longitude: number) {
  return `${floatRepr(latitude)}_${floatRepr(longitude)}`
    .replaceAll(".", "")
    .replaceAll("-", "n");
}
