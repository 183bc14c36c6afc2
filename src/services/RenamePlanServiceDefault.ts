import path from "node:path";

import { isErr } from "~shared/utils/Result";

import { formatImageName, parseImageName } from "./ImageName";
import type { RenamePlan, RenamePlanService } from "./RenamePlanService";

export class RenamePlanServiceDefault implements RenamePlanService {
  planFromList(filePaths: string[], options: { success: boolean }) {
    const plan: RenamePlan = { entries: [] };

    // 清單內已存在的檔案，以及本次計畫中已被佔用的目標
    const listed = new Set(filePaths);
    const claimed = new Set<string>();

    for (const from of filePaths) {
      const parsed = parseImageName(path.basename(from));
      if (isErr(parsed)) {
        plan.entries.push({ type: "SKIP", from, error: parsed.error });
        continue;
      }

      const to = path.join(
        path.dirname(from),
        formatImageName(parsed.value, options.success)
      );
      if (to !== from && (listed.has(to) || claimed.has(to))) {
        plan.entries.push({
          type: "SKIP",
          from,
          to,
          error: {
            type: "DESTINATION_EXISTS",
            message: `目標已存在: ${path.basename(to)}`,
          },
        });
        continue;
      }

      claimed.add(to);
      plan.entries.push({ type: "RENAME", from, to, info: parsed.value });
    }

    return plan;
  }
}
