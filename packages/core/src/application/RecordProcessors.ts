import type { JobRecord } from '../domain/model/Record.js';
import type { RecordProcessor } from '../domain/ports/RecordProcessor.js';

/** Processor that hands every record on unchanged. */
export function passThrough<P>(): RecordProcessor<P, P> {
  return {
    processRecord: (record: JobRecord<P>) => record,
  };
}

/** Run `first`, then `second` on its output. A record filtered by `first` never reaches `second`. */
export function chainProcessors<A, B, C>(
  first: RecordProcessor<A, B>,
  second: RecordProcessor<B, C>,
): RecordProcessor<A, C> {
  return {
    async processRecord(record: JobRecord<A>): Promise<JobRecord<C> | null> {
      const intermediate = await first.processRecord(record);
      if (intermediate === null) return null;
      return second.processRecord(intermediate);
    },
  };
}
