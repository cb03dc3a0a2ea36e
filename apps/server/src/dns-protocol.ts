import { ipv4ToBytes, ipv6ToBytes, formatIPv6 } from './address-normalizer.js';
import type { Answer } from './types.js';

export const QTYPE = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  PTR: 12,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  SRV: 33,
  ANY: 255,
} as const;

export const QCLASS_IN = 1;

export const RCODE = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4,
  REFUSED: 5,
} as const;

export type Rcode = (typeof RCODE)[keyof typeof RCODE];

export const FLAGS = {
  QR: 0x8000,
  AA: 0x0400,
  TC: 0x0200,
  RD: 0x0100,
  RA: 0x0080,
} as const;

const OPCODE_MASK = 0x7800;
const RCODE_MASK = 0x000f;

export const HEADER_LENGTH = 12;
export const MAX_UDP_PAYLOAD = 512;
const MAX_NAME_LENGTH = 255;
const MAX_LABEL_LENGTH = 63;
const POINTER_TO_QUESTION = 0xc000 | HEADER_LENGTH;

export function typeName(qtype: number): string {
  const entry = Object.entries(QTYPE).find(([, value]) => value === qtype);
  return entry ? entry[0] : `TYPE${qtype}`;
}

export function rcodeName(rcode: number): string {
  const entry = Object.entries(RCODE).find(([, value]) => value === rcode);
  return entry ? entry[0] : `RCODE${rcode}`;
}

export interface ParsedQuery {
  id: number;
  flags: number;
  name: string;
  type: number;
  qclass: number;
  /** offset of the first byte after the question section */
  questionEnd: number;
}

/**
 * Decodes the header and first question of a query. Responses, compressed or
 * truncated question names and short messages yield null.
 */
export function parseQuery(msg: Buffer): ParsedQuery | null {
  if (msg.length < HEADER_LENGTH) return null;

  const id = msg.readUInt16BE(0);
  const flags = msg.readUInt16BE(2);
  if ((flags & FLAGS.QR) !== 0) return null;
  if (msg.readUInt16BE(4) < 1) return null;

  let offset = HEADER_LENGTH;
  const labels: string[] = [];
  let nameLength = 0;
  let terminated = false;

  while (offset < msg.length) {
    const length = msg[offset];
    if (length === 0) {
      offset++;
      terminated = true;
      break;
    }
    // Pointers and reserved label types have no place in a question name
    if ((length & 0xc0) !== 0) return null;
    if (offset + 1 + length > msg.length) return null;

    labels.push(msg.toString('latin1', offset + 1, offset + 1 + length));
    nameLength += length + 1;
    if (nameLength > MAX_NAME_LENGTH) return null;
    offset += length + 1;
  }

  if (!terminated || offset + 4 > msg.length) return null;

  const type = msg.readUInt16BE(offset);
  const qclass = msg.readUInt16BE(offset + 2);
  return { id, flags, name: labels.join('.'), type, qclass, questionEnd: offset + 4 };
}

export function encodeName(name: string): Buffer {
  const trimmed = name.endsWith('.') ? name.slice(0, -1) : name;
  if (trimmed === '') return Buffer.from([0]);

  const parts: Buffer[] = [];
  for (const label of trimmed.split('.')) {
    if (label.length === 0 || label.length > MAX_LABEL_LENGTH) {
      throw new RangeError(`Invalid label "${label}" in name "${name}"`);
    }
    parts.push(Buffer.from([label.length]), Buffer.from(label, 'latin1'));
  }
  parts.push(Buffer.from([0]));

  const encoded = Buffer.concat(parts);
  if (encoded.length > MAX_NAME_LENGTH) {
    throw new RangeError(`Name "${name}" is longer than ${MAX_NAME_LENGTH} bytes`);
  }
  return encoded;
}

function answerTypeCode(answer: Answer): number {
  return QTYPE[answer.type];
}

export function encodeRdata(answer: Answer): Buffer {
  switch (answer.type) {
    case 'A':
      return ipv4ToBytes(answer.address);
    case 'AAAA':
      return ipv6ToBytes(answer.address);
    case 'CNAME':
    case 'PTR':
      return encodeName(answer.target);
    case 'MX': {
      const preference = Buffer.alloc(2);
      preference.writeUInt16BE(answer.priority, 0);
      return Buffer.concat([preference, encodeName(answer.exchange)]);
    }
  }
}

function encodeAnswer(answer: Answer, ttl: number): Buffer {
  const rdata = encodeRdata(answer);
  const fixed = Buffer.alloc(12);
  fixed.writeUInt16BE(POINTER_TO_QUESTION, 0);
  fixed.writeUInt16BE(answerTypeCode(answer), 2);
  fixed.writeUInt16BE(QCLASS_IN, 4);
  fixed.writeUInt32BE(ttl, 6);
  fixed.writeUInt16BE(rdata.length, 10);
  return Buffer.concat([fixed, rdata]);
}

function responseHeader(id: number, queryFlags: number, rcode: number, authoritative: boolean): Buffer {
  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt16BE(id, 0);
  let flags = FLAGS.QR | FLAGS.RA | (queryFlags & (OPCODE_MASK | FLAGS.RD)) | (rcode & RCODE_MASK);
  if (authoritative) flags |= FLAGS.AA;
  header.writeUInt16BE(flags, 2);
  return header;
}

export interface ResponseOptions {
  rcode: Rcode;
  answers?: readonly Answer[];
  ttl?: number;
  authoritative?: boolean;
  /** Responses above this size are replaced by an empty response with TC set */
  maxSize?: number;
}

export function buildResponse(query: Buffer, parsed: ParsedQuery, options: ResponseOptions): Buffer {
  const answers = options.answers ?? [];
  const ttl = options.ttl ?? 0;
  const header = responseHeader(parsed.id, parsed.flags, options.rcode, options.authoritative ?? false);
  header.writeUInt16BE(1, 4);
  const question = query.subarray(HEADER_LENGTH, parsed.questionEnd);

  const records = answers.map((answer) => encodeAnswer(answer, ttl));
  header.writeUInt16BE(records.length, 6);
  const response = Buffer.concat([header, question, ...records]);

  if (options.maxSize !== undefined && response.length > options.maxSize) {
    header.writeUInt16BE(header.readUInt16BE(2) | FLAGS.TC, 2);
    header.writeUInt16BE(0, 6);
    return Buffer.concat([header, question]);
  }
  return response;
}

/**
 * Cuts a relayed upstream response down to header and question, with TC set,
 * when it is larger than `maxSize`.
 */
export function truncateResponse(response: Buffer, query: Buffer, parsed: ParsedQuery, maxSize: number): Buffer {
  if (response.length <= maxSize) return response;
  const header = Buffer.from(response.subarray(0, HEADER_LENGTH));
  header.writeUInt16BE(header.readUInt16BE(2) | FLAGS.TC, 2);
  header.writeUInt16BE(1, 4);
  header.fill(0, 6, HEADER_LENGTH);
  return Buffer.concat([header, query.subarray(HEADER_LENGTH, parsed.questionEnd)]);
}

/**
 * Error response for a query. Without a parsed question only the header is
 * echoed back; input shorter than a header gets no response at all.
 */
export function buildErrorResponse(query: Buffer, rcode: Rcode, parsed?: ParsedQuery | null): Buffer | null {
  if (parsed) {
    return buildResponse(query, parsed, { rcode, authoritative: rcode === RCODE.NXDOMAIN });
  }
  if (query.length < HEADER_LENGTH) return null;
  return responseHeader(query.readUInt16BE(0), query.readUInt16BE(2), rcode, false);
}

export function encodeQuery(name: string, type: number, id: number, recursionDesired = true): Buffer {
  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt16BE(id, 0);
  header.writeUInt16BE(recursionDesired ? FLAGS.RD : 0, 2);
  header.writeUInt16BE(1, 4);
  const question = Buffer.alloc(4);
  question.writeUInt16BE(type, 0);
  question.writeUInt16BE(QCLASS_IN, 2);
  return Buffer.concat([header, encodeName(name), question]);
}

export function readId(msg: Buffer): number | null {
  return msg.length >= 2 ? msg.readUInt16BE(0) : null;
}

export function isResponse(msg: Buffer): boolean {
  return msg.length >= HEADER_LENGTH && (msg.readUInt16BE(2) & FLAGS.QR) !== 0;
}

export function isTruncated(msg: Buffer): boolean {
  return msg.length >= HEADER_LENGTH && (msg.readUInt16BE(2) & FLAGS.TC) !== 0;
}

export function readRcode(msg: Buffer): number | null {
  return msg.length >= HEADER_LENGTH ? msg.readUInt16BE(2) & RCODE_MASK : null;
}

function readName(msg: Buffer, start: number): { name: string; next: number } {
  const labels: string[] = [];
  let offset = start;
  let next = -1;
  let jumps = 0;

  for (;;) {
    if (offset >= msg.length) throw new RangeError('Name runs past end of message');
    const length = msg[offset];
    if (length === 0) {
      if (next === -1) next = offset + 1;
      break;
    }
    if ((length & 0xc0) === 0xc0) {
      if (offset + 1 >= msg.length) throw new RangeError('Truncated compression pointer');
      if (++jumps > 16) throw new RangeError('Compression loop');
      if (next === -1) next = offset + 2;
      offset = msg.readUInt16BE(offset) & 0x3fff;
      continue;
    }
    if (offset + 1 + length > msg.length) throw new RangeError('Label runs past end of message');
    labels.push(msg.toString('latin1', offset + 1, offset + 1 + length));
    offset += length + 1;
  }

  return { name: labels.join('.'), next };
}

export interface DecodedRecord {
  name: string;
  type: number;
  ttl: number;
  data: string | { priority: number; exchange: string };
}

export interface DecodedResponse {
  id: number;
  flags: number;
  rcode: number;
  authoritative: boolean;
  truncated: boolean;
  question: { name: string; type: number } | null;
  answers: DecodedRecord[];
}

/**
 * Decodes a response message: header, first question and the answer section
 * (A, AAAA, CNAME, PTR and MX data; other types as hex).
 */
export function decodeResponse(msg: Buffer): DecodedResponse {
  if (msg.length < HEADER_LENGTH) throw new RangeError('Message shorter than a DNS header');

  const flags = msg.readUInt16BE(2);
  const qdcount = msg.readUInt16BE(4);
  const ancount = msg.readUInt16BE(6);
  let offset = HEADER_LENGTH;

  let question: DecodedResponse['question'] = null;
  for (let i = 0; i < qdcount; i++) {
    const { name, next } = readName(msg, offset);
    if (i === 0) question = { name, type: msg.readUInt16BE(next) };
    offset = next + 4;
  }

  const answers: DecodedRecord[] = [];
  for (let i = 0; i < ancount; i++) {
    const { name, next } = readName(msg, offset);
    const type = msg.readUInt16BE(next);
    const ttl = msg.readUInt32BE(next + 4);
    const rdlength = msg.readUInt16BE(next + 8);
    const rdataStart = next + 10;
    const rdata = msg.subarray(rdataStart, rdataStart + rdlength);

    let data: DecodedRecord['data'];
    if (type === QTYPE.A) {
      data = Array.from(rdata).join('.');
    } else if (type === QTYPE.AAAA) {
      const groups: number[] = [];
      for (let g = 0; g < 16; g += 2) groups.push(rdata.readUInt16BE(g));
      data = formatIPv6(groups);
    } else if (type === QTYPE.CNAME || type === QTYPE.PTR || type === QTYPE.NS) {
      data = readName(msg, rdataStart).name;
    } else if (type === QTYPE.MX) {
      data = { priority: msg.readUInt16BE(rdataStart), exchange: readName(msg, rdataStart + 2).name };
    } else {
      data = rdata.toString('hex');
    }

    answers.push({ name, type, ttl, data });
    offset = rdataStart + rdlength;
  }

  return {
    id: msg.readUInt16BE(0),
    flags,
    rcode: flags & RCODE_MASK,
    authoritative: (flags & FLAGS.AA) !== 0,
    truncated: (flags & FLAGS.TC) !== 0,
    question,
    answers,
  };
}
