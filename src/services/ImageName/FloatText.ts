/**
 * 浮點數轉文字，輸出與既有資料集的命名工具一致：
 * - floatRepr：最短可還原位數；小數點位置在 (-4, 16] 之外改用指數，指數至少兩位
 * - toFixedHalfEven：以 double 的精確值取位，剛好一半時取偶數
 * 兩者都保留 -0 的負號。
 */

export function floatRepr(value: number): string {
  if (Number.isNaN(value)) return "nan";
  const sign = value < 0 || Object.is(value, -0) ? "-" : "";
  const abs = Math.abs(value);
  if (!Number.isFinite(abs)) return `${sign}inf`;

  // toExponential() 不給位數時即為最短可還原的有效位數
  const [mantissa, exp] = abs.toExponential().split("e");
  const digits = mantissa.replace(".", "");
  // 小數點在第 decpt 位數字之後：0.d1d2... × 10^decpt
  const decpt = Number(exp) + 1;

  if (decpt > -4 && decpt <= 16) {
    if (decpt <= 0) return `${sign}0.${"0".repeat(-decpt)}${digits}`;
    if (decpt >= digits.length) {
      return `${sign}${digits}${"0".repeat(decpt - digits.length)}.0`;
    }
    return `${sign}${digits.slice(0, decpt)}.${digits.slice(decpt)}`;
  }

  const lead = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
  const e10 = decpt - 1;
  const expText = String(Math.abs(e10)).padStart(2, "0");
  return `${sign}${lead}e${e10 < 0 ? "-" : "+"}${expText}`;
}

export function toFixedHalfEven(value: number, fractionDigits: number): string {
  if (!Number.isFinite(value)) return floatRepr(value);
  const sign = value < 0 || Object.is(value, -0) ? "-" : "";
  const { mantissa, exponent } = decompose(Math.abs(value));

  // value × 10^fractionDigits = num / den（精確有理數）
  let num = mantissa * 10n ** BigInt(fractionDigits);
  let den = 1n;
  if (exponent >= 0) num <<= BigInt(exponent);
  else den <<= BigInt(-exponent);

  let scaled = num / den;
  const twice = (num % den) * 2n;
  if (twice > den || (twice === den && scaled % 2n === 1n)) scaled += 1n;

  const text = scaled.toString().padStart(fractionDigits + 1, "0");
  const cut = text.length - fractionDigits;
  const fraction = fractionDigits > 0 ? `.${text.slice(cut)}` : "";
  return `${sign}${text.slice(0, cut)}${fraction}`;
}

// 有限且非負的 double → mantissa × 2^exponent
function decompose(abs: number) {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, abs);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & ((1n << 52n) - 1n);
  if (biased === 0) return { mantissa: fraction, exponent: -1074 };
  return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}
