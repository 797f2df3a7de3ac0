import synopDecoder from './services/SynopDecoder';
import synopEncoder from './services/SynopEncoder';
import type { EncodeOptions, SynopReport } from './types/synop.types';

/** Decodes one SYNOP telegram */
export function decodeSynop(message: string): SynopReport {
  return synopDecoder.decode(message);
}

/** Encodes a report as a single-line SYNOP telegram */
export function encodeSynop(report: SynopReport, options?: EncodeOptions): string {
  return synopEncoder.encode(report, options);
}

export { SynopDecoder } from './services/SynopDecoder';
export { SynopEncoder } from './services/SynopEncoder';
export { reportSchema, encodeOptionsSchema } from './schemas/report.schemas';
export * from './codeTables';
export * from './errors';
export * from './types/synop.types';
export { convert } from './utils/conversion';
