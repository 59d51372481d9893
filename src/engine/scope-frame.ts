/**
 * Scope Frame
 *
 * One in-flight traced operation. The frame is named only when it is popped.
 */

export class ScopeFrame {
  /** Debug identifier, only read when reporting a corrupted stack. */
  readonly tag: string;
  readonly startTime: number;
  /**
   * true: the whole elapsed time is charged to the parent's children time on pop.
   * false: only this frame's own children time passes through to the parent.
   */
  readonly deductFromParent: boolean;
  childrenTime = 0;
  name: string | undefined = undefined;

  constructor(tag: string, startTime: number, deductFromParent: boolean) {
    this.tag = tag;
    this.startTime = startTime;
    this.deductFromParent = deductFromParent;
  }

  /** Time attributed to this frame's own work, given its end time. */
  exclusiveTime(endTime: number): number {
    return endTime - this.startTime - this.childrenTime;
  }
}
