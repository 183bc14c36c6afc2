import { describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { coordinateIdentifier, parseImageName } from "@/services/ImageName";

describe("parseImageName", () => {
  test("格式 A：id,lat,lon, → 查詢影像", () => {
    const result = parseImageName("abc123,37.788169,-122.400728,.jpg");
    expectOk(result);
    expect(result.value).toEqual({
      identifier: "abc123",
      latitude: 37.788169,
      longitude: -122.400728,
      isQuery: true,
      extension: ".jpg",
    });
  });

  test("格式 A：id 可含底線與連字號，後面多餘的欄位忽略", () => {
    const result = parseImageName(
      "JJ8TdU5_UQg-WE2qt8,37.788169,-122.400728,extra,stuff.JPG"
    );
    expectOk(result);
    expect(result.value.identifier).toBe("JJ8TdU5_UQg-WE2qt8");
    expect(result.value.extension).toBe(".JPG");
  });

  test("格式 A：缺少結尾逗號不符合", () => {
    const result = parseImageName("abc123,37.788169,-122.400728.jpg");
    expectErr(result);
    expect(result.error.type).toBe("UNRECOGNIZED_FORMAT");
  });

  test("格式 B：satellite_lat_lon → 參考影像", () => {
    const result = parseImageName(
      "satellite_37.78816344751675_-122.40075733242969.png"
    );
    expectOk(result);
    expect(result.value).toMatchObject({
      latitude: 37.78816344751675,
      longitude: -122.40075733242969,
      isQuery: false,
      extension: ".png",
    });
    expect(result.value.identifier).toMatch(/^3778816\d*_n1224007\d*$/);
  });

  test("格式 B：極小或極大的座標以指數形式組成 id", () => {
    const small = parseImageName("satellite_0.00001_5.png");
    expectOk(small);
    expect(small.value.identifier).toBe("1en05_50");

    const large = parseImageName("satellite_10000000000000000_-0.0.png");
    expectOk(large);
    expect(large.value.identifier).toBe("1e+16_n00");
  });

  test("格式 B：後面不可有多餘字元", () => {
    expectErr(parseImageName("satellite_37.7_-122.4_v2.png"));
    expectErr(parseImageName("satellite_37.7_-122.4 .png"));
  });

  test("格式 B：整數座標補上 .0 再組成 id", () => {
    const result = parseImageName("satellite_37_-122.png");
    expectOk(result);
    expect(result.value.identifier).toBe("370_n1220");
    expect(result.value.latitude).toBe(37);
  });

  test("不符合任何格式", () => {
    const result = parseImageName("photo001.jpg");
    expectErr(result);
    expect(result.error).toEqual({
      type: "UNRECOGNIZED_FORMAT",
      message: "檔名不符合任何已知格式: photo001.jpg",
    });
  });

  test("已正規化的檔名不會再被解析", () => {
    expectErr(parseImageName("_abc123_query@37.788169@-122.400728@success.jpg"));
    expectErr(
      parseImageName("_3778816_n1224007@37.788160@-122.400700@success.png")
    );
  });

  test("沒有副檔名時 extension 為空字串", () => {
    const result = parseImageName("abc,1,2,");
    expectOk(result);
    expect(result.value.extension).toBe("");
    expect(result.value.longitude).toBe(2);
  });
});

describe("coordinateIdentifier", () => {
  test("移除小數點並把負號換成 n", () => {
    expect(coordinateIdentifier(-33.5, 151.25)).toBe("n335_15125");
  });

  test("-0 保留負號", () => {
    expect(coordinateIdentifier(-0, 0)).toBe("n00_00");
  });
});
