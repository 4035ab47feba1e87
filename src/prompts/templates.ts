// ---------------------------------------------------------------------------
// Prompt templates for multi-label classification.
// The system turn defines the task; the user turn carries few-shot examples,
// the article itself, and a closing format reminder.
// ---------------------------------------------------------------------------

import { TNMT_LABELS } from "../taxonomy/labels.js";
import type { ChatTurn } from "../core/types.js";

export const PROMPT_CONTENT_LIMIT = 2000;

export function buildSystemPrompt(): string {
  const labelList = TNMT_LABELS.map((label, i) => `${i + 1}. ${label}`).join("\n");

  return `Bạn là một chuyên gia phân loại văn bản trong lĩnh vực Tài nguyên và Môi trường (TNMT) của Việt Nam.

NHIỆM VỤ: Phân loại multi-label cho bài báo tiếng Việt vào một hoặc nhiều trong ${TNMT_LABELS.length} danh mục sau:

${labelList}

QUY TẮC PHÂN LOẠI:
1. Mỗi bài báo có thể thuộc 1 hoặc nhiều danh mục (multi-label)
2. Phân tích cẩn thận tiêu đề, mô tả và nội dung
3. Ưu tiên các nhãn chính xác và cụ thể nhất
4. Chỉ sử dụng nhãn "Khác" khi không phù hợp với ${TNMT_LABELS.length - 1} danh mục khác
5. Đánh giá độ tin cậy cho mỗi nhãn (0.0-1.0)

ĐỊNH DẠNG OUTPUT: JSON array với format:
[
  {"label": "tên nhãn", "confidence": 0.85},
  {"label": "tên nhãn khác", "confidence": 0.75}
]`;
}

export function buildFewShotExamples(): string {
  return `VÍ DỤ:

Ví dụ 1:
Tiêu đề: "Ô nhiễm nguồn nước do chất thải công nghiệp tại TP.HCM"
Mô tả: "Tình trạng ô nhiễm nguồn nước ngày càng nghiêm trọng"
Nội dung: "Các nhà máy xả thải trực tiếp xuống sông, ảnh hưởng đến chất lượng nước sinh hoạt..."

Output: [
  {"label": "Môi trường", "confidence": 0.95},
  {"label": "Tài nguyên nước", "confidence": 0.90}
]

Ví dụ 2:
Tiêu đề: "Ứng dụng viễn thám giám sát rừng tự nhiên"
Mô tả: "Sử dụng ảnh vệ tinh để theo dõi diện tích rừng"
Nội dung: "Công nghệ viễn thám giúp phát hiện sớm các khu vực bị phá rừng, bảo vệ đa dạng sinh học..."

Output: [
  {"label": "Viễn thám", "confidence": 0.98},
  {"label": "Đa dạng sinh học", "confidence": 0.85}
]

Ví dụ 3:
Tiêu đề: "Quy hoạch sử dụng đất nông nghiệp tỉnh An Giang"
Mô tả: "Kế hoạch sử dụng đất giai đoạn 2021-2025"
Nội dung: "Quy hoạch chi tiết việc sử dụng đất cho sản xuất nông nghiệp, bảo đảm hiệu quả kinh tế..."

Output: [
  {"label": "Đất đai", "confidence": 0.92}
]`;
}

/** Truncate to `limit` characters, marking the cut with "...". */
export function truncateContent(content: string, limit: number = PROMPT_CONTENT_LIMIT): string {
  const chars = [...content];
  return chars.length > limit ? `${chars.slice(0, limit).join("")}...` : content;
}

export function buildClassificationPrompt(
  title: string,
  description: string,
  content: string,
): string {
  return `Phân loại bài báo sau vào các danh mục phù hợp:

TIÊU ĐỀ: ${title}

MÔ TẢ: ${description}

NỘI DUNG: ${truncateContent(content)}

Hãy phân tích và trả về kết quả theo định dạng JSON đã yêu cầu:`;
}

export function buildFormatReminder(): string {
  return `QUAN TRỌNG:
- Chỉ trả về JSON array hợp lệ
- Không giải thích thêm
- Confidence score từ 0.0 đến 1.0
- Tên nhãn phải chính xác theo danh sách đã cho`;
}

/** Ordered system + user turns for one article. */
export function buildClassificationMessages(
  title: string,
  description: string,
  content: string,
): ChatTurn[] {
  const userContent = [
    buildFewShotExamples(),
    buildClassificationPrompt(title, description, content),
    buildFormatReminder(),
  ].join("\n\n");

  return [
    { role: "system", content: buildSystemPrompt() },
    { role: "user", content: userContent },
  ];
}
