/**
 * DNS wire format for load queries, via dns-packet
 */

import * as dnsPacket from 'dns-packet';
import { MalformedReplyError, errorMessage } from './errors';
import { RecordType } from './types';

export interface DecodedReply {
  id: number;
  questions: dnsPacket.Question[];
  answers: dnsPacket.Answer[];
}

export function encodeQuery(domain: string, recordType: RecordType, id: number): Buffer {
  return dnsPacket.encode({
    id,
    type: 'query',
    flags: dnsPacket.RECURSION_DESIRED,
    questions: [{
      type: recordType,
      class: 'IN',
      name: domain
    }]
  });
}

export function decodeReply(payload: Buffer): DecodedReply {
  let packet: dnsPacket.DecodedPacket;
  try {
    packet = dnsPacket.decode(payload);
  } catch (err) {
    throw new MalformedReplyError(errorMessage(err));
  }

  return {
    id: packet.id ?? 0,
    questions: packet.questions || [],
    answers: packet.answers || []
  };
}

/**
 * One-line rendering of a reply's answers for trace output
 */
export function describeAnswers(answers: dnsPacket.Answer[]): string {
  if (answers.length === 0) {
    return '(no answers)';
  }
  return answers
    .map(answer => {
      const data = 'data' in answer && typeof answer.data === 'string' ? answer.data : '';
      return `${answer.type} ${data}`.trim();
    })
    .join(', ');
}
