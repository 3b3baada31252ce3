import {
  decodeMessage,
  encodeMessage,
  ipv4ToRData,
  Opcode,
  RecordClass,
  RecordType,
  ResponseCode,
  type DNSMessage,
  type DNSQuestion,
} from './dns-message.js';
import { ResponderError, toError } from './errors.js';

/**
 * TTL in seconds of every answer record
 */
export const ANSWER_TTL = 600;

/**
 * Supplies the dotted IPv4 address to answer with
 */
export type AddressSupplier = () => string;

function buildResponse(id: number, question: DNSQuestion, address: string): DNSMessage {
  return {
    header: {
      id,
      qr: true,
      opcode: Opcode.QUERY,
      aa: false,
      tc: false,
      rd: false,
      ra: false,
      z: 0,
      rcode: ResponseCode.NOERROR,
    },
    questions: [{ ...question }],
    answers: [
      {
        name: question.name,
        type: RecordType.A,
        class: RecordClass.IN,
        ttl: ANSWER_TTL,
        data: ipv4ToRData(address),
      },
    ],
    authorities: [],
    additionals: [],
  };
}

export interface AnsweredQuery {
  response: Buffer;
  question: DNSQuestion;
  address: string;
}

/**
 * Answer the first question of a raw DNS request with a single A record, returning the
 * question and address alongside the encoded response.
 *
 * The question's type and class are not checked, and any further questions are ignored.
 * Performs no I/O beyond calling `supplyAddress` once.
 *
 * @throws ResponderError `MalformedRequest`, `NoQuestion` or `EncodeError`; no bytes are produced on failure
 */
export function answerQuery(request: Buffer, supplyAddress: AddressSupplier): AnsweredQuery {
  let query: DNSMessage;
  try {
    query = decodeMessage(request);
  } catch (error) {
    throw new ResponderError('MalformedRequest', `Malformed request: ${toError(error).message}`, { cause: error });
  }

  if (query.questions.length === 0) {
    throw new ResponderError('NoQuestion', 'Request contains no question');
  }
  const question = query.questions[0];
  const address = supplyAddress();

  let response: Buffer;
  try {
    response = encodeMessage(buildResponse(query.header.id, question, address));
  } catch (error) {
    throw new ResponderError('EncodeError', `Failed to encode response: ${toError(error).message}`, { cause: error });
  }

  return { response, question, address };
}

export function respond(request: Buffer, supplyAddress: AddressSupplier): Buffer {
  return answerQuery(request, supplyAddress).response;
}
