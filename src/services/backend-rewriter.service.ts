import * as fs from 'fs/promises';
import { BACKEND_NAME } from '../config';
import { AlreadySetError, ConfigurationError, DocumentError, errorMessage } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';
import { tokenize, ParseError, type Token } from '../parser';

export interface RewriteFileSystem {
  readFile(filePath: string): Promise<Buffer>;
  writeFile(filePath: string, data: Buffer | string): Promise<void>;
  unlink(filePath: string): Promise<void>;
}

export const nodeRewriteFileSystem: RewriteFileSystem = {
  readFile: (filePath) => fs.readFile(filePath),
  writeFile: (filePath, data) => fs.writeFile(filePath, data),
  unlink: (filePath) => fs.unlink(filePath),
};

export interface InsertionPoint {
  /** Offset the new line goes in front of: the end of the organization line. */
  offset: number;
  indent: string;
  eol: string;
}

function isStatementStart(tokens: Token[], index: number): boolean {
  const prev = tokens[index - 1];
  return prev === undefined || prev.type === 'newline' || prev.type === 'lbrace';
}

/** Index of the `{` opening the top-level `backend "tmcloud"` block, or -1. */
function findBackendBlock(tokens: Token[]): number {
  let depth = 0;
  for (let k = 0; k < tokens.length; k++) {
    const tok = tokens[k];
    if (
      depth === 0 &&
      tok.type === 'ident' &&
      tok.value === 'backend' &&
      tokens[k + 1]?.type === 'string' &&
      tokens[k + 1].value === BACKEND_NAME &&
      tokens[k + 2]?.type === 'lbrace'
    ) {
      return k + 2;
    }
    if (tok.type === 'lbrace' || tok.type === 'open') depth++;
    if (tok.type === 'rbrace' || tok.type === 'close') depth--;
  }
  return -1;
}

/**
 * Locate where `document = "<slug>"` goes: right after the organization
 * attribute of the backend block, with that line's indentation (spaces or
 * tabs) and the file's line endings. Comments never count as attributes.
 *
 * Offsets index `text` directly; decode bytes as latin1 to get byte offsets.
 */
export function findInsertionPoint(text: string): InsertionPoint {
  let tokens: Token[];
  try {
    tokens = tokenize(text);
  } catch (err) {
    if (err instanceof ParseError) {
      throw new DocumentError(`Cannot update the backend block: ${err.message}`, { cause: err });
    }
    throw err;
  }

  const open = findBackendBlock(tokens);
  if (open === -1) {
    throw new ConfigurationError('none', `No backend "${BACKEND_NAME}" block found`);
  }

  let organization = -1;
  let depth = 1;
  for (let k = open + 1; k < tokens.length && depth > 0; k++) {
    const tok = tokens[k];
    if (tok.type === 'lbrace' || tok.type === 'open') depth++;
    if (tok.type === 'rbrace' || tok.type === 'close') depth--;
    if (depth !== 1 || tok.type !== 'ident' || tokens[k + 1]?.type !== 'equals') continue;
    if (!isStatementStart(tokens, k)) continue;

    const value = tokens[k + 2];
    if (tok.value === 'document') {
      throw new AlreadySetError(value?.type === 'string' ? value.value : text.slice(value.start, value.end));
    }
    if (tok.value === 'organization' && value?.type === 'string' && organization === -1) {
      organization = k;
    }
  }

  if (organization === -1) {
    throw new ConfigurationError(
      'missing-organization',
      'Could not find organization in backend block'
    );
  }

  const name = tokens[organization];
  const value = tokens[organization + 2];
  const after = tokens[organization + 3];

  // Keep a trailing comment on the organization line with that line
  let offset = value.end;
  if (after?.type === 'newline') {
    offset = text[after.start - 1] === '\r' ? after.start - 1 : after.start;
  }

  const lineStart = text.lastIndexOf('\n', name.start - 1) + 1;
  const indent = /^[ \t]*/.exec(text.slice(lineStart, name.start))?.[0] ?? '';
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  return { offset, indent, eol };
}

function documentLine(point: InsertionPoint, slug: string): string {
  return `${point.eol}${point.indent}document = "${slug}"`;
}

/** Text of the backend block with `document = "<slug>"` added. */
export function insertDocumentSlug(text: string, slug: string): string {
  const point = findInsertionPoint(text);
  return `${text.slice(0, point.offset)}${documentLine(point, slug)}${text.slice(point.offset)}`;
}

/** Byte-level variant: every byte outside the inserted line is kept as is. */
export function insertDocumentSlugBytes(content: Buffer, slug: string): Buffer {
  const point = findInsertionPoint(content.toString('latin1'));
  return Buffer.concat([
    content.subarray(0, point.offset),
    Buffer.from(documentLine(point, slug), 'utf-8'),
    content.subarray(point.offset),
  ]);
}

export function backupPathFor(filePath: string): string {
  return `${filePath}.bak`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Record a newly created cloud document in the local file's backend block.
 *
 * The original bytes are copied to `<file>.bak` first. If writing the new
 * content fails, the original is written back and the backup removed before
 * the error is rethrown; on success the backup is removed. If the original
 * cannot be restored, the backup is left in place and named in the error.
 */
export async function rewriteBackendBlock(
  filePath: string,
  slug: string,
  fileSystem: RewriteFileSystem = nodeRewriteFileSystem,
  logger: Pick<Logger, 'warn'> = defaultLogger
): Promise<void> {
  const original = await fileSystem.readFile(filePath);
  const updated = insertDocumentSlugBytes(original, slug);

  const backupPath = backupPathFor(filePath);
  const removeBackup = async () => {
    try {
      await fileSystem.unlink(backupPath);
    } catch (err) {
      if (!isMissingFile(err)) {
        logger.warn(`Could not remove backup ${backupPath}: ${errorMessage(err)}`);
      }
    }
  };

  try {
    await fileSystem.writeFile(backupPath, original);
  } catch (err) {
    await removeBackup();
    throw err;
  }

  try {
    await fileSystem.writeFile(filePath, updated);
  } catch (err) {
    try {
      await fileSystem.writeFile(filePath, original);
    } catch (restoreErr) {
      throw new Error(
        `Failed to update ${filePath} (${errorMessage(err)}) and to restore it (${errorMessage(restoreErr)}). ` +
        `The original content is in ${backupPath}.`,
        { cause: err }
      );
    }
    await removeBackup();
    throw err;
  }

  await removeBackup();
}
