/**
 * Line-oriented parser for compiler stability reports.
 *
 * Recognises two line families and ignores everything else:
 *
 *   unstable class UiState {              ← class header
 *     unstable val items: List<Item>      ← member, attached to the open class
 *     stable val title: String
 *     <runtime stability> = Unstable      ← deeper unknown line, ignored
 *   }                                     ← closes the class
 *
 *   restartable skippable fun Header(     ← markers, then the nearest `fun Name(`
 *     stable title: String
 *     unstable items: List<Item>          ← recorded as an unstable parameter
 *   )
 */
import { readFile } from '../../utils/file-system.js';
import { IOError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import type {
  ClassRecord,
  ComposableRecord,
  ReportMember,
  ReportRecord,
  Stability,
} from './types.js';

const CLASS_LINE = /^(\s*)(stable|unstable)\s+class\s+([A-Za-z_$][\w$.]*)/;
const MEMBER_LINE = /^(\s+)(stable|unstable)\s+(val|var)\s+([A-Za-z_$][\w$]*)\s*:\s*(.+?)\s*$/;
const PARAM_LINE = /^\s*((?:[a-z]+\s+)*)([A-Za-z_$][\w$]*)\s*:/;
const INLINE_UNSTABLE_PARAM = /\bunstable\s+([A-Za-z_$][\w$]*)\s*:/g;
const FUN_SIGNATURE = /\bfun\s+([A-Za-z_$][\w$]*)\s*\(/;
const RESTARTABLE = /\brestartable\b/;
const SKIPPABLE = /\bskippable\b/;
const NOT_SKIPPABLE = /\bnot\s+skippable\b/;

interface Markers {
  restartable: boolean;
  skippable: boolean;
}

interface ClassDraft {
  name: string;
  stability: Stability;
  members: ReportMember[];
  line: number;
}

interface ComposableDraft {
  name: string;
  markers: Markers;
  params: string[];
  line: number;
}

type ParserState =
  | { tag: 'outside' }
  | { tag: 'in-class'; draft: ClassDraft; indent: number }
  | { tag: 'pending-composable'; markers: Markers }
  | { tag: 'in-composable'; draft: ComposableDraft };

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function readMarkers(line: string): Markers | null {
  const restartable = RESTARTABLE.test(line);
  const mentionsSkippable = SKIPPABLE.test(line);
  if (!restartable && !mentionsSkippable) return null;
  return { restartable, skippable: mentionsSkippable && !NOT_SKIPPABLE.test(line) };
}

/** Name of the parameter on this line when it is qualified `unstable`. */
function unstableParam(qualifiers: string, name: string): string | null {
  return qualifiers.split(/\s+/).includes('unstable') ? name : null;
}

function finishClass(draft: ClassDraft): ClassRecord {
  const record: ClassRecord = {
    kind: 'class',
    name: draft.name,
    stability: draft.stability,
    unstableMembers: Object.freeze(draft.members.map((member) => Object.freeze(member))),
    line: draft.line,
  };
  return Object.freeze(record);
}

function finishComposable(draft: ComposableDraft): ComposableRecord {
  const record: ComposableRecord = {
    kind: 'composable',
    name: draft.name,
    restartable: draft.markers.restartable,
    skippable: draft.markers.skippable,
    unstableParameters: Object.freeze([...draft.params]),
    line: draft.line,
  };
  return Object.freeze(record);
}

/**
 * Parse report text into records, in file order.
 */
export function parseReport(text: string): ReportRecord[] {
  const records: ReportRecord[] = [];
  let state: ParserState = { tag: 'outside' };

  const lines = text.split(/\r?\n/);

  /** Handles a line while no class or parameter block is open. */
  const scanTopLevel = (line: string, lineNumber: number, pending: Markers | null): ParserState => {
    const classMatch = CLASS_LINE.exec(line);
    if (classMatch) {
      return {
        tag: 'in-class',
        indent: classMatch[1].length,
        draft: {
          name: classMatch[3],
          stability: classMatch[2] === 'stable' ? 'stable' : 'unstable',
          members: [],
          line: lineNumber,
        },
      };
    }

    const markers = readMarkers(line) ?? pending;
    if (!markers) return { tag: 'outside' };

    const fun = FUN_SIGNATURE.exec(line);
    if (!fun) return { tag: 'pending-composable', markers };

    const rest = line.slice(fun.index + fun[0].length);
    const closeAt = rest.indexOf(')');
    const inline = closeAt >= 0 ? rest.slice(0, closeAt) : rest;
    const params = [...inline.matchAll(INLINE_UNSTABLE_PARAM)].map((m) => m[1]);
    const draft: ComposableDraft = { name: fun[1], markers, params, line: lineNumber };
    if (closeAt >= 0) {
      records.push(finishComposable(draft));
      return { tag: 'outside' };
    }
    return { tag: 'in-composable', draft };
  };

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const lineNumber = index + 1;

    switch (state.tag) {
      case 'in-class': {
        if (line.trim().length === 0) continue;
        const member = MEMBER_LINE.exec(line);
        if (member && member[1].length > state.indent) {
          if (member[2] === 'unstable') {
            state.draft.members.push({
              name: member[4],
              type: member[5],
              mutable: member[3] === 'var',
            });
          }
          continue;
        }
        if (indentOf(line) > state.indent) continue;
        records.push(finishClass(state.draft));
        state = scanTopLevel(line, lineNumber, null);
        continue;
      }

      case 'in-composable': {
        const trimmed = line.trim();
        if (trimmed.startsWith(')')) {
          records.push(finishComposable(state.draft));
          state = { tag: 'outside' };
          continue;
        }
        const param = PARAM_LINE.exec(line);
        if (param) {
          const name = unstableParam(param[1], param[2]);
          if (name) state.draft.params.push(name);
          continue;
        }
        if (trimmed.length > 0 && indentOf(line) === 0) {
          // Unterminated parameter block; the next declaration starts here.
          records.push(finishComposable(state.draft));
          state = scanTopLevel(line, lineNumber, null);
        }
        continue;
      }

      case 'pending-composable':
        state = scanTopLevel(line, lineNumber, state.markers);
        continue;

      case 'outside':
        state = scanTopLevel(line, lineNumber, null);
        continue;
    }
  }

  if (state.tag === 'in-class') {
    records.push(finishClass(state.draft));
  } else if (state.tag === 'in-composable') {
    records.push(finishComposable(state.draft));
  }

  return records;
}

/**
 * Read and parse a report file.
 */
export function parseReportFile(filePath: string): ReportRecord[] {
  let text: string;
  try {
    text = readFile(filePath);
  } catch (error) {
    throw new IOError(
      ErrorCodes.REPORT_UNREADABLE,
      `Cannot read report ${filePath}: ${errorMessage(error)}`,
      { path: filePath }
    );
  }
  return parseReport(text);
}
