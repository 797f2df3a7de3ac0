import config from '../config';
import { DecodeError } from '../errors';
import { decodeSection0 } from '../sections/section0';
import { decodeSection1Mandatory, section1Handlers } from '../sections/section1';
import { decodeDisplacement, decodeSeaLandIce, section2Handlers } from '../sections/section2';
import { SECTION3_REPEATABLE, section3Handlers } from '../sections/section3';
import { createDecodeContext, type DecodeContext, type GroupHandler } from '../sections/context';
import type { SynopReport } from '../types/synop.types';
import { GroupReader } from '../utils/groupReader';
import logger from '../utils/logger';

type Boundary = (group: string) => boolean;

const SECTION2_HEADER = /^222[\d/]{2}$/;
const DATA_GROUP = /^\d[\d/]{4}$/;

const isSection2: Boundary = (group) => SECTION2_HEADER.test(group);
const isIce: Boundary = (group) => group === 'ICE';
const isSection3: Boundary = (group) => group === '333';
const isSection4: Boundary = (group) => group === '444';
const isSection5: Boundary = (group) => group === '555';

const anyOf = (...boundaries: Boundary[]): Boundary => (group) => boundaries.some((boundary) => boundary(group));

const SECTION1_END = anyOf(isSection2, isIce, isSection3, isSection4, isSection5);
const SECTION2_END = anyOf(isIce, isSection3, isSection4, isSection5);
const ICE_END = anyOf(isSection3, isSection4, isSection5);
const SECTION3_END = anyOf(isSection4, isSection5);

/**
 * Turns FM-12 SYNOP telegrams into structured reports
 */
class SynopDecoder {
  decode(message: string): SynopReport {
    try {
      return this.decodeReport(message);
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('Unexpected failure while decoding report', { message, error: reason });
      throw new DecodeError(reason);
    }
  }

  private decodeReport(message: string): SynopReport {
    const reader = new GroupReader(message);
    const report: SynopReport = {};
    const context = createDecodeContext();

    if (this.decodeSections(reader, report, context) && reader.hasNext()) {
      logger.warn('Unexpected groups at end of report', { groups: reader.takeUntil(() => false) });
    }

    if (context.notImplemented.length > 0) {
      report._not_implemented = [...context.notImplemented];
    }
    return report;
  }

  /** Returns false when the telegram ended before a section was complete */
  private decodeSections(reader: GroupReader, report: SynopReport, context: DecodeContext): boolean {
    if (!decodeSection0(reader, report, context)) {
      return false;
    }

    const first = reader.peek();
    if (first !== undefined && first.toUpperCase() === 'NIL') {
      reader.next();
      return true;
    }

    if (first !== undefined && !SECTION1_END(first)) {
      logger.debug('Decoding section 1');
      if (!decodeSection1Mandatory(reader, report, context)) {
        return false;
      }
      this.runSection(reader, report, context, section1Handlers, SECTION1_END);
    }

    const displacement = reader.peek();
    if (displacement !== undefined && isSection2(displacement)) {
      logger.debug('Decoding section 2');
      if (context.stationType !== 'BBXX') {
        logger.warn('Section 2 sent by a station that is not a sea station', { stationType: context.stationType });
      }
      reader.next();
      report.displacement = decodeDisplacement(displacement);
      this.runSection(reader, report, context, section2Handlers, SECTION2_END);
    }

    const ice = reader.peek();
    if (ice !== undefined && isIce(ice)) {
      reader.next();
      report.sea_land_ice = decodeSeaLandIce(reader.takeUntil(ICE_END));
    }

    const section3 = reader.peek();
    if (section3 !== undefined && isSection3(section3)) {
      logger.debug('Decoding section 3');
      reader.next();
      this.runSection(reader, report, context, section3Handlers, SECTION3_END, SECTION3_REPEATABLE);
    }

    const section4 = reader.peek();
    if (section4 !== undefined && isSection4(section4)) {
      reader.next();
      report.section4 = reader.takeUntil(isSection5);
    }

    const section5 = reader.peek();
    if (section5 !== undefined && isSection5(section5)) {
      reader.next();
      report.section5 = reader.takeUntil(() => false);
    }
    return true;
  }

  /**
   * Dispatches groups on their header digit until `isEnd` accepts the next
   * group. Headers must not go backwards: each header may appear once,
   * except those in `repeatable`, which may follow themselves.
   */
  private runSection(
    reader: GroupReader,
    report: SynopReport,
    context: DecodeContext,
    handlers: Readonly<Record<number, GroupHandler>>,
    isEnd: Boundary,
    repeatable: ReadonlySet<number> = new Set(),
  ): void {
    const headers = Object.keys(handlers).map(Number);
    let candidate = Math.min(...headers);

    let group = reader.peek();
    while (group !== undefined && !isEnd(group)) {
      reader.next();
      const header = DATA_GROUP.test(group) ? Number(group.charAt(0)) : null;
      const handler = header === null ? undefined : handlers[header];

      if (header === null || handler === undefined || header < candidate) {
        this.skip(group, context);
      } else {
        handler(group, reader, report, context);
        candidate = repeatable.has(header) ? header : header + 1;
      }
      group = reader.peek();
    }
  }

  private skip(group: string, context: DecodeContext): void {
    logger.warn(`Unable to decode group ${group}`);
    if (config.decoder.recordSkippedGroups) {
      context.notImplemented.push(group);
    }
  }
}

const synopDecoder = new SynopDecoder();
export { SynopDecoder };
export default synopDecoder;
