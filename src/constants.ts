/** 只處理這些副檔名，大小寫需完全相符 */
export const imageExtensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".JPG",
  ".JPEG",
  ".PNG",
] as const;

export const renameStatuses = ["success", "failure"] as const;

export const defaultRoot = "demo-img";
export const defaultStatus: RenameStatus = "success";

export type RenameStatus = (typeof renameStatuses)[number];
