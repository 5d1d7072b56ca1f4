import type { ChatMessage, CompletionOptions, LlmClient } from '../ai/llmClient.js';
import type { Logger } from '../../../lib/logger/logger.js';
import type {
  Clock,
  CognitiveProfile,
  PedagogyProfile,
  PedagogyTrait,
  SupportLevel,
  TutorCandidate
} from '../types.js';

export class FakeClock implements Clock {
  constructor(public current = 1_700_000_000_000) {}

  now() {
    return this.current;
  }

  advance(ms: number) {
    this.current += ms;
  }
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {}
};

// Low on every direct dimension, medium on impulsivity and reasoning: every need is HIGH.
export const ALL_HIGH_NEEDS: CognitiveProfile = {
  confidence: 20,
  anxiety: 50,
  processingSpeed: 20,
  workingMemory: 20,
  precision: 20,
  errorCorrection: 20,
  exploration: 20,
  impulsivity: 50,
  logicalReasoning: 50,
  hypotheticalReasoning: 50
};

const TRAIT_ORDER: readonly PedagogyTrait[] = ['TCS', 'TSPI', 'TWMLS', 'TPO', 'TECP', 'TET', 'TICS', 'TRD'];

export function pedagogy(level: SupportLevel): PedagogyProfile {
  return pedagogyWithHigh(level === 'HIGH' ? TRAIT_ORDER.length : 0);
}

// The first `count` traits in table order are HIGH, the rest LOW.
export function pedagogyWithHigh(count: number): PedagogyProfile {
  const level = (index: number): SupportLevel => (index < count ? 'HIGH' : 'LOW');
  return {
    TCS: level(0),
    TSPI: level(1),
    TWMLS: level(2),
    TPO: level(3),
    TECP: level(4),
    TET: level(5),
    TICS: level(6),
    TRD: level(7)
  };
}

export function tutor(
  id: string,
  price: number,
  subjects: string[],
  profile: PedagogyProfile = pedagogy('HIGH')
): TutorCandidate {
  return { id, name: `Tutor ${id}`, price, subjects, pedagogy: profile };
}

// Perfect / Good / Poor cognitive fit for ALL_HIGH_NEEDS, all teaching Mathematics.
export function scenarioPool(): TutorCandidate[] {
  return [
    tutor('tutor-c', 400, ['Mathematics'], pedagogy('LOW')),
    tutor('tutor-a', 800, ['Mathematics'], pedagogy('HIGH')),
    tutor('tutor-b', 600, ['Mathematics'], pedagogyWithHigh(4))
  ];
}

type Reply = (messages: ChatMessage[], options: CompletionOptions) => Promise<string>;

export class ScriptedLlmClient implements LlmClient {
  readonly provider = 'scripted';
  readonly model = 'scripted-1';
  calls: ChatMessage[][] = [];
  private reply: Reply;

  constructor(reply: Reply) {
    this.reply = reply;
  }

  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    this.calls.push(messages);
    return this.reply(messages, options);
  }
}

export function rankingReply(ids: string[]): string {
  return JSON.stringify({
    matches: ids.map((id) => ({
      tutor_id: id,
      reasoning: `AI pick ${id}`,
      subject_explanation: `Teaches what ${id} was asked for.`
    }))
  });
}

export function hangUntilAborted(_messages: ChatMessage[], options: CompletionOptions): Promise<string> {
  return new Promise<string>((_resolve, reject) => {
    options.signal.addEventListener('abort', () => reject(new Error('aborted')));
  });
}
