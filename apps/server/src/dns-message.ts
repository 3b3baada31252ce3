import { parseIPv4 } from './ipv4.js';

export const RecordType = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  PTR: 12,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  SRV: 33,
  OPT: 41,
  ANY: 255,
} as const;

export const RecordClass = {
  IN: 1,
  CH: 3,
  HS: 4,
  ANY: 255,
} as const;

export const Opcode = {
  QUERY: 0,
  IQUERY: 1,
  STATUS: 2,
  NOTIFY: 4,
  UPDATE: 5,
} as const;

export const ResponseCode = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4,
  REFUSED: 5,
} as const;

export const HEADER_SIZE = 12;
const MAX_LABEL_LENGTH = 63;
// Wire length: length octets, label bytes and the terminating zero
const MAX_NAME_LENGTH = 255;
// Compression pointers carry 14 bits of offset
const MAX_POINTER_OFFSET = 0x3fff;

export interface DNSHeader {
  id: number;
  qr: boolean;
  opcode: number;
  aa: boolean;
  tc: boolean;
  rd: boolean;
  ra: boolean;
  z: number;
  rcode: number;
}

export interface DNSQuestion {
  name: string;
  type: number;
  class: number;
}

export interface DNSResourceRecord {
  name: string;
  type: number;
  class: number;
  ttl: number;
  data: Buffer;
}

export interface DNSMessage {
  header: DNSHeader;
  questions: DNSQuestion[];
  answers: DNSResourceRecord[];
  authorities: DNSResourceRecord[];
  additionals: DNSResourceRecord[];
}

export class DNSWireError extends Error {
  readonly offset?: number;

  constructor(message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (offset ${offset})`);
    this.name = 'DNSWireError';
    this.offset = offset;
  }
}

export function recordTypeName(type: number): string {
  for (const [name, value] of Object.entries(RecordType)) {
    if (value === type) return name;
  }
  return `TYPE${type}`;
}

/**
 * Presentation form of a raw label: printable ASCII as-is, `.` and `\` backslash-escaped,
 * everything else as `\DDD`.
 */
function escapeLabel(bytes: Buffer): string {
  let label = '';
  for (const byte of bytes) {
    if (byte === 0x2e || byte === 0x5c) {
      label += `\\${String.fromCharCode(byte)}`;
    } else if (byte >= 0x21 && byte <= 0x7e) {
      label += String.fromCharCode(byte);
    } else {
      label += `\\${byte.toString().padStart(3, '0')}`;
    }
  }
  return label;
}

function decodeName(buf: Buffer, start: number): { name: string; next: number } {
  const labels: string[] = [];
  let offset = start;
  let next = -1;
  let wireLength = 1;
  // Every pointer must land strictly before the previous jump target, so decoding terminates
  let lowestTarget = start;

  for (;;) {
    if (offset >= buf.length) {
      throw new DNSWireError('Name runs past end of message', offset);
    }

    const length = buf[offset];
    if (length === 0) {
      if (next === -1) next = offset + 1;
      break;
    }

    const labelType = length & 0xc0;
    if (labelType === 0xc0) {
      if (offset + 1 >= buf.length) {
        throw new DNSWireError('Compression pointer truncated', offset);
      }
      const pointer = ((length & 0x3f) << 8) | buf[offset + 1];
      if (pointer >= lowestTarget) {
        throw new DNSWireError(`Compression pointer to ${pointer} does not point backwards`, offset);
      }
      if (next === -1) next = offset + 2;
      lowestTarget = pointer;
      offset = pointer;
      continue;
    }

    if (labelType !== 0) {
      throw new DNSWireError(`Unsupported label type 0x${labelType.toString(16)}`, offset);
    }

    const end = offset + 1 + length;
    if (end > buf.length) {
      throw new DNSWireError('Label runs past end of message', offset);
    }

    wireLength += length + 1;
    if (wireLength > MAX_NAME_LENGTH) {
      throw new DNSWireError(`Name exceeds ${MAX_NAME_LENGTH} bytes`, start);
    }

    labels.push(escapeLabel(buf.subarray(offset + 1, end)));
    offset = end;
  }

  return { name: labels.length > 0 ? `${labels.join('.')}.` : '.', next };
}

/**
 * Split a presentation-format name into raw labels. A missing trailing dot is allowed;
 * `""` and `"."` are the root.
 */
function nameToLabels(name: string): Buffer[] {
  if (name === '' || name === '.') return [];

  const chars = Array.from(name);
  const labels: Buffer[] = [];
  let current: number[] = [];

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];

    if (char === '\\') {
      const digits = chars.slice(i + 1, i + 4).join('');
      if (/^\d{3}$/.test(digits)) {
        const value = parseInt(digits, 10);
        if (value > 255) {
          throw new DNSWireError(`Invalid escape \\${digits} in name "${name}"`);
        }
        current.push(value);
        i += 3;
        continue;
      }

      const escaped = chars[i + 1];
      if (escaped === undefined) {
        throw new DNSWireError(`Dangling escape in name "${name}"`);
      }
      current.push(...Buffer.from(escaped, 'utf8'));
      i += 1;
      continue;
    }

    if (char === '.') {
      if (current.length === 0) {
        throw new DNSWireError(`Empty label in name "${name}"`);
      }
      labels.push(Buffer.from(current));
      current = [];
      continue;
    }

    current.push(...Buffer.from(char, 'utf8'));
  }

  if (current.length > 0) {
    labels.push(Buffer.from(current));
  }

  let wireLength = 1;
  for (const label of labels) {
    if (label.length > MAX_LABEL_LENGTH) {
      throw new DNSWireError(`Label longer than ${MAX_LABEL_LENGTH} bytes in name "${name}"`);
    }
    wireLength += label.length + 1;
  }
  if (wireLength > MAX_NAME_LENGTH) {
    throw new DNSWireError(`Name "${name}" exceeds ${MAX_NAME_LENGTH} bytes`);
  }

  return labels;
}

function checkUint(value: number, bits: number, field: string): number {
  const max = 2 ** bits - 1;
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new DNSWireError(`${field} ${value} is outside 0-${max}`);
  }
  return value;
}

class WireWriter {
  private chunks: Buffer[] = [];
  private written = 0;
  // Suffix key -> offset of its first occurrence
  private names = new Map<string, number>();

  get length(): number {
    return this.written;
  }

  bytes(data: Buffer): void {
    this.chunks.push(data);
    this.written += data.length;
  }

  u16(value: number): void {
    const buf = Buffer.alloc(2);
    buf.writeUInt16BE(value, 0);
    this.bytes(buf);
  }

  u32(value: number): void {
    const buf = Buffer.alloc(4);
    buf.writeUInt32BE(value, 0);
    this.bytes(buf);
  }

  name(name: string): void {
    const labels = nameToLabels(name);

    for (let i = 0; i < labels.length; i++) {
      const key = labels
        .slice(i)
        .map((label) => label.toString('hex'))
        .join('.');
      const pointer = this.names.get(key);
      if (pointer !== undefined) {
        this.u16(0xc000 | pointer);
        return;
      }

      if (this.written <= MAX_POINTER_OFFSET) {
        this.names.set(key, this.written);
      }
      this.bytes(Buffer.from([labels[i].length]));
      this.bytes(labels[i]);
    }

    this.bytes(Buffer.from([0]));
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.written);
  }
}

function decodeRecords(buf: Buffer, start: number, count: number): { records: DNSResourceRecord[]; next: number } {
  const records: DNSResourceRecord[] = [];
  let offset = start;

  for (let i = 0; i < count; i++) {
    const { name, next } = decodeName(buf, offset);
    if (next + 10 > buf.length) {
      throw new DNSWireError('Resource record header truncated', next);
    }

    const type = buf.readUInt16BE(next);
    const rclass = buf.readUInt16BE(next + 2);
    const ttl = buf.readUInt32BE(next + 4);
    const rdLength = buf.readUInt16BE(next + 8);
    const dataStart = next + 10;
    if (dataStart + rdLength > buf.length) {
      throw new DNSWireError(`Record data of ${rdLength} bytes truncated`, dataStart);
    }

    records.push({
      name,
      type,
      class: rclass,
      ttl,
      data: Buffer.from(buf.subarray(dataStart, dataStart + rdLength)),
    });
    offset = dataStart + rdLength;
  }

  return { records, next: offset };
}

/**
 * Decode a complete DNS message. Every question and record announced by the header
 * must be present; bytes after the last record are ignored.
 *
 * @throws DNSWireError on truncated or malformed input
 */
export function decodeMessage(buf: Buffer): DNSMessage {
  if (buf.length < HEADER_SIZE) {
    throw new DNSWireError(`Message is ${buf.length} bytes, the header alone needs ${HEADER_SIZE}`, 0);
  }

  const flags = buf.readUInt16BE(2);
  const header: DNSHeader = {
    id: buf.readUInt16BE(0),
    qr: (flags & 0x8000) !== 0,
    opcode: (flags >> 11) & 0x0f,
    aa: (flags & 0x0400) !== 0,
    tc: (flags & 0x0200) !== 0,
    rd: (flags & 0x0100) !== 0,
    ra: (flags & 0x0080) !== 0,
    z: (flags >> 4) & 0x07,
    rcode: flags & 0x0f,
  };

  const qdCount = buf.readUInt16BE(4);
  const anCount = buf.readUInt16BE(6);
  const nsCount = buf.readUInt16BE(8);
  const arCount = buf.readUInt16BE(10);

  const questions: DNSQuestion[] = [];
  let offset = HEADER_SIZE;
  for (let i = 0; i < qdCount; i++) {
    const { name, next } = decodeName(buf, offset);
    if (next + 4 > buf.length) {
      throw new DNSWireError('Question truncated', next);
    }
    questions.push({ name, type: buf.readUInt16BE(next), class: buf.readUInt16BE(next + 2) });
    offset = next + 4;
  }

  const answers = decodeRecords(buf, offset, anCount);
  const authorities = decodeRecords(buf, answers.next, nsCount);
  const additionals = decodeRecords(buf, authorities.next, arCount);

  return {
    header,
    questions,
    answers: answers.records,
    authorities: authorities.records,
    additionals: additionals.records,
  };
}

/**
 * Encode a message, compressing repeated names.
 *
 * @throws DNSWireError when a field does not fit its wire representation
 */
export function encodeMessage(message: DNSMessage): Buffer {
  const { header } = message;
  const flags =
    (header.qr ? 0x8000 : 0) |
    (checkUint(header.opcode, 4, 'Opcode') << 11) |
    (header.aa ? 0x0400 : 0) |
    (header.tc ? 0x0200 : 0) |
    (header.rd ? 0x0100 : 0) |
    (header.ra ? 0x0080 : 0) |
    (checkUint(header.z, 3, 'Z') << 4) |
    checkUint(header.rcode, 4, 'Response code');

  const writer = new WireWriter();
  writer.u16(checkUint(header.id, 16, 'ID'));
  writer.u16(flags);
  writer.u16(checkUint(message.questions.length, 16, 'Question count'));
  writer.u16(checkUint(message.answers.length, 16, 'Answer count'));
  writer.u16(checkUint(message.authorities.length, 16, 'Authority count'));
  writer.u16(checkUint(message.additionals.length, 16, 'Additional count'));

  for (const question of message.questions) {
    writer.name(question.name);
    writer.u16(checkUint(question.type, 16, 'Type'));
    writer.u16(checkUint(question.class, 16, 'Class'));
  }

  for (const record of [...message.answers, ...message.authorities, ...message.additionals]) {
    writer.name(record.name);
    writer.u16(checkUint(record.type, 16, 'Type'));
    writer.u16(checkUint(record.class, 16, 'Class'));
    writer.u32(checkUint(record.ttl, 32, 'TTL'));
    writer.u16(checkUint(record.data.length, 16, 'Record data length'));
    writer.bytes(record.data);
  }

  return writer.toBuffer();
}

/**
 * RDATA of an A record
 */
export function ipv4ToRData(address: string): Buffer {
  const value = parseIPv4(address);
  if (value === null) {
    throw new DNSWireError(`Invalid IPv4 address "${address}"`);
  }
  const data = Buffer.alloc(4);
  data.writeUInt32BE(value, 0);
  return data;
}
