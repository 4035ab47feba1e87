import { z } from "zod";

// ── TNMT topic labels ───────────────────────────────────────────────────────
// Natural resources & environment (Tài nguyên và Môi trường) subtopics.

export const TNMT_LABELS = [
  "Biển - hải đảo",
  "Thông tin chung",
  "Môi trường",
  "Địa chất - Khoáng sản",
  "Đất đai",
  "Đa dạng sinh học",
  "Viễn thám",
  "Quản lý chất thải rắn",
  "Đo đạc và bản đồ",
  "Khí tượng thủy văn - Biến đổi khí hậu",
  "Tài nguyên nước",
  "Khác",
] as const;

export type TaxonomyLabel = (typeof TNMT_LABELS)[number];

export const LabelSchema = z.enum(TNMT_LABELS);

export const LABEL_DESCRIPTIONS: Record<TaxonomyLabel, string> = {
  "Biển - hải đảo":
    "Các vấn đề liên quan đến biển, đại dương, hải đảo, tài nguyên biển, kinh tế biển",
  "Thông tin chung":
    "Thông tin tổng hợp, chính sách, quy định chung về tài nguyên môi trường",
  "Môi trường": "Ô nhiễm môi trường, bảo vệ môi trường, môi trường sống, sinh thái",
  "Địa chất - Khoáng sản":
    "Khảo sát địa chất, khai thác khoáng sản, tài nguyên địa chất",
  "Đất đai": "Quản lý đất đai, quy hoạch sử dụng đất, chất lượng đất",
  "Đa dạng sinh học": "Bảo tồn thiên nhiên, động thực vật hoang dã, khu bảo tồn",
  "Viễn thám": "Ứng dụng viễn thám, ảnh vệ tinh, GIS trong tài nguyên môi trường",
  "Quản lý chất thải rắn": "Thu gom, xử lý chất thải, rác thải, tái chế",
  "Đo đạc và bản đồ": "Đo đạc địa hình, lập bản đồ, định vị GPS",
  "Khí tượng thủy văn - Biến đổi khí hậu":
    "Dự báo thời tiết, biến đổi khí hậu, thiên tai",
  "Tài nguyên nước": "Quản lý nguồn nước, cấp nước, xử lý nước thải",
  "Khác": "Các chủ đề khác không thuộc các danh mục trên",
};

const LABEL_SET: ReadonlySet<string> = new Set(TNMT_LABELS);

/** Exact-match membership test against the fixed taxonomy. */
export function isValidLabel(label: string): label is TaxonomyLabel {
  return LABEL_SET.has(label);
}

/** Labels are numbered 1..12 in taxonomy order. */
export function getLabelById(id: number): TaxonomyLabel | null {
  if (!Number.isInteger(id) || id < 1 || id > TNMT_LABELS.length) return null;
  return TNMT_LABELS[id - 1] ?? null;
}

/** Returns -1 for names outside the taxonomy. */
export function getLabelId(name: string): number {
  const idx = TNMT_LABELS.findIndex((label) => label === name);
  return idx === -1 ? -1 : idx + 1;
}

export function filterValidLabels(names: readonly string[]): TaxonomyLabel[] {
  return names.filter(isValidLabel);
}
