import sharp from 'sharp';
import type { DispatchOutcome, GenerationTransport } from '../resilient-client';
import type { RemoteFailureKind } from '../errors';
import type { GenerationInput, GenerationRequest } from '../types';

export async function makePng(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: '#336699' } }).png().toBuffer();
}

export async function makeJpeg(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: '#0b3a6e' } }).jpeg().toBuffer();
}

/** Runs `fn` and returns what it threw. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

export const VALID_HTML = '<!DOCTYPE html><html><body>x</body></html>';

export function baseInput(overrides: Partial<GenerationInput> = {}): GenerationInput {
  return {
    briefText: 'Senior data analyst with 8 years in retail; SQL, Python and Power BI.',
    accentColor: '#336699',
    model: 'gpt-4.1-mini',
    maxTokens: 6000,
    temperature: 0.2,
    attachments: [],
    systemInstructions: 'Return one complete HTML document.',
    ...overrides,
  };
}

type Step = DispatchOutcome | ((signal: AbortSignal) => Promise<DispatchOutcome>);

/** Replays the scripted outcomes in order; the last step repeats. */
export class ScriptedTransport implements GenerationTransport {
  readonly requests: GenerationRequest[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(private readonly steps: Step[]) {}

  get calls(): number {
    return this.requests.length;
  }

  async dispatch(request: GenerationRequest, signal: AbortSignal): Promise<DispatchOutcome> {
    const step = this.steps[Math.min(this.requests.length, this.steps.length - 1)];
    this.requests.push(request);
    this.signals.push(signal);
    return typeof step === 'function' ? step(signal) : step;
  }
}

export function success(text: string = VALID_HTML): DispatchOutcome {
  return { kind: 'success', text };
}

export function failure(kind: RemoteFailureKind, status?: number): DispatchOutcome {
  return { kind: 'failure', failure: { kind, message: `${kind} from fake transport`, status } };
}
