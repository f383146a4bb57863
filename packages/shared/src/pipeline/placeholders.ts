/**
 * Stage 4: PlaceholderSubstitutor
 *
 * Rewrites blank-fill labels in narrative text to template tokens. Each label
 * gets two passes: label followed by a blank run, then a bare `label:` that is
 * not already followed by a token. Running the substitutor on its own output
 * changes nothing.
 */

import type { ExtractedItem } from './pipeline-context';
import { BLANK_RUN } from './text-utils';

export const PLACEHOLDER_TOKENS = [
  'provider',
  'patient_name',
  'patient_dob',
  'tooth_or_site',
  'planned_procedure',
  'diagnosis',
  'alternative_treatment',
  'today_date',
] as const;

export type PlaceholderToken = (typeof PLACEHOLDER_TOKENS)[number];

export interface PlaceholderLabel {
  /** Regex source for the label text; the matched text is kept */
  pattern: string;
  /** Text between label and token */
  joiner: string;
  /** Whether the bare `label:` pass applies */
  bare: boolean;
}

export interface PlaceholderEntry {
  token: PlaceholderToken;
  labels: PlaceholderLabel[];
}

const LEFT_GUARD = '(?<![A-Za-z0-9])';
/** "Date" is left alone after of, Birth and Signed */
const DATE_QUALIFIER_GUARD = '(?<!\\bof[ \\t]+)(?<!\\bBirth[ \\t]+)(?<!\\bSigned[ \\t]+)';

function label(pattern: string, joiner = ': ', bare = true): PlaceholderLabel {
  return { pattern, joiner, bare };
}

export const PLACEHOLDER_REGISTRY: readonly PlaceholderEntry[] = [
  {
    token: 'provider',
    labels: [label('Dr\\.', ' ', false), label('(?:Doctor|Dentist|Provider)')],
  },
  {
    token: 'patient_name',
    labels: [
      label('Patient(?:[\'’]s)?[ \\t]+Name'),
      label('Name[ \\t]+of[ \\t]+Patient'),
      label('I,', ' ', false),
    ],
  },
  {
    token: 'patient_dob',
    labels: [
      label('Date[ \\t]+of[ \\t]+Birth'),
      label('DOB'),
      label('Birth[ \\t]*date'),
    ],
  },
  {
    token: 'tooth_or_site',
    labels: [
      label('Tooth[ \\t]+Numbers?'),
      label('Tooth[ \\t]*/[ \\t]*Site'),
      label('Tooth[ \\t]+No\\(s\\)\\.', ' '),
      label('Tooth[ \\t]+No\\.'),
      label('Tooth[ \\t]*#'),
    ],
  },
  {
    token: 'planned_procedure',
    labels: [
      label('Planned[ \\t]+Procedure'),
      label('Proposed[ \\t]+(?:Procedure|Treatment)'),
    ],
  },
  {
    token: 'diagnosis',
    labels: [label('Diagnosis')],
  },
  {
    token: 'alternative_treatment',
    labels: [label('Alternative[ \\t]+Treatments?')],
  },
  {
    token: 'today_date',
    labels: [label(`${DATE_QUALIFIER_GUARD}Date`)],
  },
];

interface CompiledPass {
  pattern: RegExp;
  replacement: string;
}

function compile(registry: readonly PlaceholderEntry[]): CompiledPass[] {
  const passes: CompiledPass[] = [];
  for (const entry of registry) {
    for (const item of entry.labels) {
      // `$1` is the label as written in the source line
      const replacement = `$1${item.joiner}{{${entry.token}}}`;
      passes.push({
        pattern: new RegExp(`${LEFT_GUARD}(${item.pattern})[ \\t]*:?[ \\t]*${BLANK_RUN}`, 'gi'),
        replacement,
      });
      if (item.bare) {
        passes.push({
          pattern: new RegExp(`${LEFT_GUARD}(${item.pattern})[ \\t]*:(?![ \\t]*\\{\\{)`, 'gi'),
          replacement,
        });
      }
    }
  }
  return passes;
}

const DEFAULT_PASSES = compile(PLACEHOLDER_REGISTRY);

export function substitutePlaceholders(text: string): string {
  let output = text;
  for (const { pattern, replacement } of DEFAULT_PASSES) {
    output = output.replace(pattern, replacement);
  }
  return output;
}

export function applyPlaceholders(items: readonly ExtractedItem[]): ExtractedItem[] {
  return items.map((item): ExtractedItem =>
    item.kind === 'narrative'
      ? {
          kind: 'narrative',
          block: {
            section: item.block.section,
            lines: item.block.lines.map((line) => ({ ...line, text: substitutePlaceholders(line.text) })),
          },
        }
      : item
  );
}
