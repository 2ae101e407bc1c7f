/**
 * Field extraction prompt and output schema.
 */

import { z } from 'zod';
import type { RetrievalHit } from '../retrieval/planner.js';
import { NOT_FOUND_VALUE, type FieldSpec } from './types.js';

/** Passages longer than this are cut in the prompt */
const MAX_EVIDENCE_CHARS = 1500;

export const FieldOutputSchema = z.object({
  found: z.boolean(),
  value: z.string().nullish(),
  /** 1-based index of the supporting passage */
  evidence: z.number().int().nullish(),
  /** Verbatim text copied from that passage */
  quote: z.string().nullish(),
  confidence: z.number().nullish(),
});

export type FieldOutput = z.infer<typeof FieldOutputSchema>;

export function formatEvidence(hits: readonly RetrievalHit[]): string {
  return hits
    .map((hit, i) => {
      const page = hit.page !== undefined ? `（第${hit.page}页）` : '';
      return `[${i + 1}]${page} ${hit.text.slice(0, MAX_EVIDENCE_CHARS)}`;
    })
    .join('\n\n');
}

export function buildExtractionPrompt(field: FieldSpec, hits: readonly RetrievalHit[]): string {
  return `请根据以下招标文件片段，提取"${field.label}"。
说明：${field.hint}

要求：
1. 严格忠于原文，不要添加任何主观判断
2. 只能使用下面提供的片段；如果片段中没有该信息，found 返回 false，value 填写"${NOT_FOUND_VALUE}"
3. evidence 填写支持答案的片段编号，quote 逐字摘录该片段中的相关原文
4. confidence 为0到1之间的置信度
5. 必须返回有效的JSON格式

文档片段：
${formatEvidence(hits)}

返回格式：{"found": true, "value": "提取的内容", "evidence": 1, "quote": "原文摘录", "confidence": 0.9}`;
}
