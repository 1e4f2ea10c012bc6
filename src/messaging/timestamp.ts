export interface RowMeta {
  arrivedAt: number | null;
  sender: string;
}

// "[14:05, 3/7/2025] Ana: " and the 12-hour "[2:05 PM, 3/7/2025] Ana: " variant.
const META_RE = /^\s*\[(\d{1,2}):(\d{2})(?:\s*([AaPp])\.?\s*[Mm]\.?)?,\s*(\d{1,2})[./-](\d{1,2})[./-](\d{2,4})\]\s*(.*?):?\s*$/;

/**
 * Parses the row prefix as local time. Day comes first unless only the
 * month-first reading is a valid date.
 */
export function parseRowMeta(meta: string | undefined): RowMeta {
  const match = META_RE.exec(String(meta ?? ""));
  if (!match) return { arrivedAt: null, sender: "" };
  const [, hh, mm, meridiem, first, second, yearRaw, sender] = match;

  let hours = Number(hh);
  const minutes = Number(mm);
  if (meridiem) {
    const pm = meridiem.toLowerCase() === "p";
    if (hours === 12) hours = pm ? 12 : 0;
    else if (pm) hours += 12;
  }
  let day = Number(first);
  let month = Number(second);
  if (month > 12 && day <= 12) [day, month] = [month, day];
  const year = Number(yearRaw) < 100 ? 2000 + Number(yearRaw) : Number(yearRaw);

  if (hours > 23 || minutes > 59 || month < 1 || month > 12 || day < 1 || day > 31) {
    return { arrivedAt: null, sender: String(sender ?? "").trim() };
  }
  const date = new Date(year, month - 1, day, hours, minutes, 0, 0);
  if (date.getMonth() !== month - 1) return { arrivedAt: null, sender: String(sender ?? "").trim() };
  return { arrivedAt: date.getTime(), sender: String(sender ?? "").trim() };
}
