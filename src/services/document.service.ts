import * as fs from 'fs/promises';
import { createHash } from 'crypto';
import { parseDocument, ParseError, type ParsedBlock } from '../parser';
import { DocumentError, errorMessage } from '../errors';

export interface BackendDeclaration {
  /** First label of the block: `backend "<name>" { ... }`. */
  name: string;
  organization: string;
  /** Remote document short-name; empty when not declared. */
  document: string;
  line: number;
}

export interface ThreatModelDeclaration {
  name: string;
  description: string;
}

export interface LocalDocument {
  path: string;
  content: Buffer;
  /** SHA-256 hex digest of the exact bytes on disk. */
  fingerprint: string;
  backends: BackendDeclaration[];
  threatModels: ThreatModelDeclaration[];
  /** Unique `ref` values of threat blocks, in file order. */
  threatRefs: string[];
  /** Unique `ref` values of control blocks inside threats, in file order. */
  controlRefs: string[];
}

type Declarations = Pick<LocalDocument, 'backends' | 'threatModels' | 'threatRefs' | 'controlRefs'>;

export function fingerprint(content: Buffer | string): string {
  return createHash('sha256').update(content).digest('hex');
}

function stringAttr(block: ParsedBlock, name: string): string {
  const value = block.attributes[name];
  return typeof value === 'string' ? value : '';
}

function childBlocks(blocks: ParsedBlock[], type: string): ParsedBlock[] {
  return blocks.flatMap((b) => b.blocks.filter((child) => child.type === type));
}

function uniqueRefs(blocks: ParsedBlock[]): string[] {
  const refs = new Set<string>();
  for (const block of blocks) {
    const ref = stringAttr(block, 'ref');
    if (ref) refs.add(ref);
  }
  return [...refs];
}

// Threats and controls may carry only a `ref` to a library item; their
// description is then filled in from the library.
export function extractDeclarations(source: string): Declarations {
  const parsed = parseDocument(source);

  const backends = parsed.blocks
    .filter((b) => b.type === 'backend')
    .map((b) => ({
      name: b.labels[0] ?? '',
      organization: stringAttr(b, 'organization'),
      document: stringAttr(b, 'document'),
      line: b.line,
    }));

  const modelBlocks = parsed.blocks.filter((b) => b.type === 'threatmodel');
  const threatModels = modelBlocks.map((b) => ({
    name: b.labels[0] ?? '',
    description: stringAttr(b, 'description'),
  }));

  const threats = childBlocks(modelBlocks, 'threat');
  return {
    backends,
    threatModels,
    threatRefs: uniqueRefs(threats),
    controlRefs: uniqueRefs(childBlocks(threats, 'control')),
  };
}

/**
 * Read a threat-model file, fingerprint it and pull out its backend and
 * threat-model declarations.
 */
export async function readDocument(filePath: string): Promise<LocalDocument> {
  let content: Buffer;
  try {
    content = await fs.readFile(filePath);
  } catch (err) {
    throw new DocumentError(`Error reading file ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  let declarations: Declarations;
  try {
    declarations = extractDeclarations(content.toString('utf-8'));
  } catch (err) {
    if (err instanceof ParseError) {
      throw new DocumentError(`Error parsing ${filePath}: ${err.message}`, { cause: err });
    }
    throw err;
  }

  return {
    path: filePath,
    content,
    fingerprint: fingerprint(content),
    ...declarations,
  };
}
