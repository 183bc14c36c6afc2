import { describe, expect, test } from "vitest";

import { expectOk } from "~shared/testkit/ExpectResult";

import {
  type ParsedImageInfo,
  formatImageName,
  parseImageName,
} from "@/services/ImageName";

const queryInfo: ParsedImageInfo = {
  identifier: "abc123",
  latitude: 37.788169,
  longitude: -122.400728,
  isQuery: true,
  extension: ".jpg",
};

describe("formatImageName", () => {
  test("查詢影像加上 _query 後綴", () => {
    expect(formatImageName(queryInfo, true)).toBe(
      "_abc123_query@37.788169@-122.400728@success.jpg"
    );
  });

  test("參考影像沒有後綴，座標補滿六位小數，副檔名大小寫不變", () => {
    const info: ParsedImageInfo = {
      identifier: "370_n1220",
      latitude: 37,
      longitude: -122,
      isQuery: false,
      extension: ".PNG",
    };
    expect(formatImageName(info, false)).toBe(
      "_370_n1220@37.000000@-122.000000@failure.PNG"
    );
  });

  test("超過六位小數時四捨五入，負號保留", () => {
    const info: ParsedImageInfo = {
      ...queryInfo,
      latitude: 1.23456789,
      longitude: -0.0000004,
    };
    expect(formatImageName(info, true)).toBe(
      "_abc123_query@1.234568@-0.000000@success.jpg"
    );
  });

  test("-0 座標保留負號，與識別碼一致", () => {
    const parsed = parseImageName("satellite_-0.0_1.5.png");
    expectOk(parsed);
    expect(formatImageName(parsed.value, true)).toBe(
      "_n00_15@-0.000000@1.500000@success.png"
    );
  });

  test("精確的一半取偶數", () => {
    const parsed = parseImageName("q,0.0078125,1,.jpg");
    expectOk(parsed);
    expect(formatImageName(parsed.value, true)).toBe(
      "_q_query@0.007812@1.000000@success.jpg"
    );
  });
});
