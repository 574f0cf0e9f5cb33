/**
 * Hands out `{prefix}/{slug}-{unixSeconds}` branch names.
 * Timestamps are strictly increasing within one process, so two tasks with the
 * same slug started in the same second still get distinct branches. Separate
 * processes can still collide.
 */
export class BranchNamer {
  private lastTimestamp = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  next(prefix: string, slug: string): string {
    let timestamp = Math.floor(this.clock().getTime() / 1000);
    if (timestamp <= this.lastTimestamp) {
      timestamp = this.lastTimestamp + 1;
    }
    this.lastTimestamp = timestamp;
    return `${prefix}/${slug}-${timestamp}`;
  }
}
