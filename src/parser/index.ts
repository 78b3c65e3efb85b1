export { tokenize, ParseError } from './tokenize';
export type { Token, TokenType } from './tokenize';
export { parseDocument } from './parse-document';
export type { AttributeValue, ParsedBlock, ParsedDocument } from './parse-document';
