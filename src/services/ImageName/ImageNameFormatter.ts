import type { RenameStatus } from "@/constants";

import { toFixedHalfEven } from "./FloatText";
import type { ParsedImageInfo } from "./ImageName";

/**
 * 產生正規化檔名：_<id>[_query]@<lat>@<lon>@<status><ext>
 * 座標固定六位小數，剛好一半時取偶數，-0 保留負號。
 */
export function formatImageName(info: ParsedImageInfo, success: boolean) {
  const querySuffix = info.isQuery ? "_query" : "";
  const status: RenameStatus = success ? "success" : "failure";
  const lat = toFixedHalfEven(info.latitude, 6);
  const lon = toFixedHalfEven(info.longitude, 6);
  return `_${info.identifier}${querySuffix}@${lat}@${lon}@${status}${info.extension}`;
}
