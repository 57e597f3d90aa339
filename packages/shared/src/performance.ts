export type Clock = () => number;

/**
 * Frame timing for hosts: FPS over the last second and duration of the last
 * simulation step.
 */
export class PerformanceMonitor {
  private fps = 0;
  private windowStart = 0;
  private frameStart = 0;
  private frameCount = 0;
  private tickMs = 0;
  private readonly now: Clock;

  constructor(now: Clock = () => performance.now()) {
    this.now = now;
    this.windowStart = now();
  }

  public startFrame(): void {
    this.frameStart = this.now();
  }

  public endFrame(): void {
    const now = this.now();
    this.tickMs = now - this.frameStart;
    this.frameCount++;

    // Vypočítat FPS každou sekundu
    if (now >= this.windowStart + 1000) {
      this.fps = this.frameCount * 1000 / (now - this.windowStart);
      this.frameCount = 0;
      this.windowStart = now;
    }
  }

  public getFps(): number {
    return this.fps;
  }

  public getTickMs(): number {
    return this.tickMs;
  }
}
