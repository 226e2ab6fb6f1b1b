import * as fs from 'fs';
import { noopLogger, type Logger } from '../utils/logger.js';
import { ID_MARKER, STATUS_HEADING, TASK_HEADING, isMetadataLine } from './parser.js';
import { normalizeStatus } from './types.js';

/**
 * Result of rewriting TASKS.md content
 */
export interface RewriteResult {
  content: string;
  modified: boolean;
}

interface Line {
  text: string;
  eol: string;
}

function splitLines(content: string): Line[] {
  const lines: Line[] = [];
  const pattern = /([^\r\n]*)(\r\n|\n|$)/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(content)) !== null) {
    if (match[0] === '') {
      break;
    }
    lines.push({ text: match[1], eol: match[2] });
  }

  return lines;
}

function joinLines(lines: Line[]): string {
  return lines.map((line) => line.text + line.eol).join('');
}

export function formatIdMarker(id: string): string {
  return `<!-- id: ${id} -->`;
}

/**
 * Inject or repair `<!-- id: ... -->` markers for the tasks named in `idMap`
 *
 * Only the first `###` heading carrying a given title is touched. An existing
 * marker anywhere in the task's metadata block is replaced in place; otherwise
 * a marker is inserted on the line after the heading.
 */
export function applyIdWriteback(
  content: string,
  idMap: Readonly<Record<string, string>>,
  logger: Logger = noopLogger
): RewriteResult {
  const lines = splitLines(content);
  const eol = lines[0]?.eol === '\r\n' ? '\r\n' : '\n';
  const handled = new Set<string>();
  let modified = false;

  for (let i = 0; i < lines.length; i++) {
    const heading = TASK_HEADING.exec(lines[i].text);
    if (!heading) {
      continue;
    }

    const title = heading[1].trim();
    const newId = idMap[title];
    if (newId === undefined || handled.has(title)) {
      continue;
    }
    handled.add(title);

    let markerIndex = -1;
    for (let j = i + 1; j < lines.length; j++) {
      const text = lines[j].text;
      if (TASK_HEADING.test(text) || STATUS_HEADING.test(text)) {
        break;
      }
      if (text.trim() !== '' && !isMetadataLine(text)) {
        break;
      }
      if (ID_MARKER.test(text.trim())) {
        markerIndex = j;
        break;
      }
    }

    if (markerIndex >= 0) {
      const existing = ID_MARKER.exec(lines[markerIndex].text.trim());
      if (existing && existing[1] === newId) {
        logger.debug(`Writeback: '${title}' already has ID ${newId}`);
        continue;
      }
      lines[markerIndex] = { text: formatIdMarker(newId), eol: lines[markerIndex].eol || eol };
      logger.debug(`Writeback: '${title}' replaced stale ID ${existing?.[1] ?? ''} -> ${newId}`);
    } else {
      if (lines[i].eol === '') {
        lines[i] = { ...lines[i], eol };
      }
      lines.splice(i + 1, 0, { text: formatIdMarker(newId), eol });
      logger.debug(`Writeback: '${title}' injected ID ${newId}`);
    }
    modified = true;
  }

  return { content: modified ? joinLines(lines) : content, modified };
}

/**
 * Write board item IDs back into a TASKS.md file
 *
 * @returns True if the file was modified
 */
export function writebackIds(
  filePath: string,
  idMap: Readonly<Record<string, string>>,
  logger: Logger = noopLogger
): boolean {
  if (Object.keys(idMap).length === 0) {
    return false;
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const result = applyIdWriteback(content, idMap, logger);

  if (result.modified) {
    fs.writeFileSync(filePath, result.content, 'utf-8');
  }

  return result.modified;
}

/**
 * Remove every task block under a heading that normalizes to `Done`.
 * The status heading itself is kept.
 */
export function stripDoneTasks(content: string): RewriteResult {
  const lines = splitLines(content);
  const kept: Line[] = [];
  let currentStatus: string | undefined;
  let skipping = false;
  let modified = false;

  for (const line of lines) {
    const statusHeading = STATUS_HEADING.exec(line.text);
    if (statusHeading) {
      currentStatus = normalizeStatus(statusHeading[1]);
      skipping = false;
      kept.push(line);
      continue;
    }

    if (TASK_HEADING.test(line.text)) {
      skipping = currentStatus === 'Done';
      if (skipping) {
        modified = true;
        continue;
      }
    }

    if (!skipping) {
      kept.push(line);
    }
  }

  if (!modified) {
    return { content, modified: false };
  }

  const collapsed: Line[] = [];
  let lastBlank = false;
  for (const line of kept) {
    const blank = line.text.trim() === '';
    if (blank && lastBlank) {
      continue;
    }
    collapsed.push(line);
    lastBlank = blank;
  }

  return { content: joinLines(collapsed), modified: true };
}

/**
 * Remove Done tasks from a TASKS.md file
 *
 * @returns True if the file was modified
 */
export function removeDoneTasks(filePath: string): boolean {
  const content = fs.readFileSync(filePath, 'utf-8');
  const result = stripDoneTasks(content);

  if (result.modified) {
    fs.writeFileSync(filePath, result.content, 'utf-8');
  }

  return result.modified;
}
