import { OptionalCounter, Reducer, max, mergeCounter, sum } from './numeric';

export interface EdgeMetadataFields {
  egressPacketCount?: OptionalCounter;
  ingressPacketCount?: OptionalCounter;
  // Transport layer
  egressByteCount?: OptionalCounter;
  ingressByteCount?: OptionalCounter;
  maxConnCountTCP?: OptionalCounter;
}

/**
 * Counters a probe may collect about one directed edge over some time window.
 * Every field is optional and merges independently of the others.
 */
export class EdgeMetadata implements EdgeMetadataFields {
  readonly egressPacketCount: OptionalCounter;
  readonly ingressPacketCount: OptionalCounter;
  readonly egressByteCount: OptionalCounter;
  readonly ingressByteCount: OptionalCounter;
  readonly maxConnCountTCP: OptionalCounter;

  constructor(fields: EdgeMetadataFields = {}) {
    this.egressPacketCount = fields.egressPacketCount;
    this.ingressPacketCount = fields.ingressPacketCount;
    this.egressByteCount = fields.egressByteCount;
    this.ingressByteCount = fields.ingressByteCount;
    this.maxConnCountTCP = fields.maxConnCountTCP;
  }

  copy(): EdgeMetadata {
    return new EdgeMetadata(this);
  }

  /**
   * Fold a later observation of the same edge into this one. Traffic
   * counters add up; the connection count keeps its high-water mark.
   */
  merge(other: EdgeMetadata): EdgeMetadata {
    return this.combine(other, max);
  }

  /**
   * Combine two different edges seen over the same window, e.g. when
   * collapsing fine-grained edges into a coarser one. All fields are summed.
   * Summing two maxima over-estimates the true maximum of the union; it is
   * a best effort.
   */
  flatten(other: EdgeMetadata): EdgeMetadata {
    return this.combine(other, sum);
  }

  private combine(other: EdgeMetadata, connReducer: Reducer): EdgeMetadata {
    return new EdgeMetadata({
      egressPacketCount: mergeCounter(this.egressPacketCount, other.egressPacketCount, sum),
      ingressPacketCount: mergeCounter(this.ingressPacketCount, other.ingressPacketCount, sum),
      egressByteCount: mergeCounter(this.egressByteCount, other.egressByteCount, sum),
      ingressByteCount: mergeCounter(this.ingressByteCount, other.ingressByteCount, sum),
      maxConnCountTCP: mergeCounter(this.maxConnCountTCP, other.maxConnCountTCP, connReducer),
    });
  }
}
