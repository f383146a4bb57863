/**
 * Stage 3: FieldPatternMatcher
 *
 * Walks every section line by line. Block rules get the first look at each
 * position; otherwise segment rules are dispatched against the line until
 * nothing more matches. Each matched segment is cut out and the rest of the
 * line is dispatched again, so one line can yield several fields. Whatever is
 * left becomes narrative text for the section.
 *
 * Lines carrying a signer role are split at their blanks: role segments go to
 * narrative for the role filter, the other segments are matched as usual.
 */

import type { DocumentLine } from '../types';
import { BLOCK_RULES, SEGMENT_RULES, type BlockMatch, type BlockRule, type SegmentRule } from './field-rules';
import type {
  CandidateField,
  ExtractedItem,
  NarrativeBlock,
  NarrativeLine,
  PipelineContext,
} from './pipeline-context';
import { SIGNATURE_SECTION, type ClassifiedDocument } from './section-classifier';
import { classifySignerRole } from './signature-roles';
import { BLANK_RUN, collapseWhitespace } from './text-utils';

interface SegmentHit {
  rule: SegmentRule;
  match: RegExpExecArray;
}

export interface MatchOptions {
  /** Signature-scoped rules apply in every section */
  fieldShaped?: boolean;
}

const RESIDUAL_EDGE_RE = /^[\s,;:|–-]+|[\s,;:|–-]+$/g;
/** Label plus blank run, or the tail of the line */
const FIELD_CHUNK_RE = new RegExp(`.*?${BLANK_RUN}|.+$`, 'g');
/** Date blank that belongs to the role segment before it */
const ROLE_DATE_RE = /^date\b/i;

function inScope(rule: SegmentRule | BlockRule, signatureRules: boolean): boolean {
  return rule.scope === 'any' || signatureRules;
}

export function fieldChunks(text: string): string[] {
  return (text.match(FIELD_CHUNK_RE) ?? []).map((chunk) => chunk.trim()).filter((chunk) => chunk.length > 0);
}

function overlaps(a: RegExpExecArray, b: RegExpExecArray): boolean {
  return a.index < b.index + b[0].length && b.index < a.index + a[0].length;
}

function cut(text: string, match: RegExpExecArray): string {
  const before = text.slice(0, match.index);
  const after = text.slice(match.index + match[0].length);
  return collapseWhitespace(`${before} ${after}`).replace(RESIDUAL_EDGE_RE, '');
}

function findHits(text: string, signatureRules: boolean, matchedRules: ReadonlySet<string>): SegmentHit[] {
  const hits: SegmentHit[] = [];
  for (const rule of SEGMENT_RULES) {
    if (!inScope(rule, signatureRules)) continue;
    if (rule.after !== undefined && !matchedRules.has(rule.after)) continue;
    const match = rule.pattern.exec(text);
    if (match && match[0].length > 0) {
      hits.push({ rule, match });
    }
  }
  return hits;
}

export class FieldPatternMatcher {
  private readonly items: ExtractedItem[] = [];
  private readonly narrative = new Map<string, NarrativeBlock>();

  constructor(
    private readonly context: PipelineContext,
    private readonly options: MatchOptions = {}
  ) {}

  run(document: ClassifiedDocument): ExtractedItem[] {
    for (const section of document.sections) {
      this.matchSection(section.name, section.lines);
    }
    return this.items;
  }

  private matchSection(sectionName: string, lines: readonly DocumentLine[]): void {
    const signatureRules = sectionName === SIGNATURE_SECTION || this.options.fieldShaped === true;
    let i = 0;
    while (i < lines.length) {
      const block = this.matchBlock(lines, i, signatureRules);
      if (block) {
        this.emitBlock(block, sectionName, lines[i].index);
        i += block.match.consumed;
        continue;
      }

      const line = lines[i];
      if (classifySignerRole(line.text) !== null) {
        this.matchRoleLine(line, sectionName, signatureRules);
      } else {
        this.matchSegments(line, sectionName, signatureRules);
      }
      i += 1;
    }
  }

  private matchRoleLine(line: DocumentLine, section: string, signatureRules: boolean): void {
    const bold = line.bold === true;
    let roleText: string | null = null;
    const flush = (): void => {
      if (roleText !== null) {
        this.addNarrative(section, { index: line.index, text: roleText, bold });
        roleText = null;
      }
    };

    for (const chunk of fieldChunks(line.text)) {
      if (classifySignerRole(chunk) !== null) {
        flush();
        roleText = chunk;
      } else if (roleText !== null && ROLE_DATE_RE.test(chunk)) {
        roleText = `${roleText} ${chunk}`;
      } else {
        flush();
        this.matchSegments({ ...line, text: chunk }, section, signatureRules);
      }
    }
    flush();
  }

  private matchBlock(
    lines: readonly DocumentLine[],
    start: number,
    signatureRules: boolean
  ): { rule: BlockRule; match: BlockMatch } | null {
    for (const rule of BLOCK_RULES) {
      if (!inScope(rule, signatureRules)) continue;
      const match = rule.match(lines, start);
      if (match) {
        return { rule, match };
      }
    }
    return null;
  }

  private emitBlock(block: { rule: BlockRule; match: BlockMatch }, section: string, lineIndex: number): void {
    const { rule, match } = block;
    if (match.key !== null) {
      if (this.context.isProcessed(match.key)) return;
      this.context.markProcessed(match.key);
    }
    this.addField({
      key: match.key,
      title: match.title,
      section,
      optional: false,
      type: match.type,
      control: { options: match.options, hint: null },
      lineIndex,
      origin: 'block',
      rule: rule.name,
    });
  }

  private matchSegments(line: DocumentLine, section: string, signatureRules: boolean): void {
    const matchedRules = new Set<string>();
    let remaining = line.text.trim();

    while (remaining.length > 0) {
      const hits = findHits(remaining, signatureRules, matchedRules);
      if (hits.length === 0) break;

      const [chosen, ...others] = hits;
      const competing = others.filter(
        (hit) => !hit.rule.fallback && hit.rule.key !== chosen.rule.key && overlaps(hit.match, chosen.match)
      );
      if (competing.length > 0 && !chosen.rule.fallback) {
        this.context.addWarning({
          kind: 'pattern_ambiguity',
          line_index: line.index,
          text: remaining,
          chosen_rule: chosen.rule.name,
          competing_rules: competing.map((hit) => hit.rule.name),
        });
      }

      matchedRules.add(chosen.rule.name);
      this.emitSegment(chosen, section, line.index);
      remaining = cut(remaining, chosen.match);
    }

    if (matchedRules.size === 0) {
      this.addNarrative(section, { index: line.index, text: line.text, bold: line.bold === true });
    } else if (/[A-Za-z0-9]/.test(remaining)) {
      this.addNarrative(section, { index: line.index, text: remaining, bold: line.bold === true });
    }
  }

  private emitSegment(hit: SegmentHit, section: string, lineIndex: number): void {
    const { rule, match } = hit;
    if (rule.key !== null) {
      // Same concept seen again: consume the segment without a new record
      if (this.context.isProcessed(rule.key)) return;
      if (rule.markProcessed) this.context.markProcessed(rule.key);
    }
    const title = typeof rule.title === 'function' ? rule.title(match) : rule.title;
    const control = typeof rule.control === 'function' ? rule.control(match) : rule.control;
    this.addField({
      key: rule.key,
      title,
      section,
      optional: rule.optional ?? false,
      type: rule.type,
      control: { ...control },
      lineIndex,
      origin: 'segment',
      rule: rule.name,
    });
  }

  private addField(field: CandidateField): void {
    this.items.push({ kind: 'field', field });
  }

  private addNarrative(section: string, line: NarrativeLine): void {
    let block = this.narrative.get(section);
    if (!block) {
      block = { section, lines: [] };
      this.narrative.set(section, block);
      this.items.push({ kind: 'narrative', block });
    }
    block.lines.push(line);
  }
}

export function matchFields(
  document: ClassifiedDocument,
  context: PipelineContext,
  options: MatchOptions = {}
): ExtractedItem[] {
  return new FieldPatternMatcher(context, options).run(document);
}
