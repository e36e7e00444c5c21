/**
 * @fileoverview Cycle counter for the simulation loop with callbacks scheduled
 * on cycle numbers. Tasks due on the same cycle run in scheduling order.
 */

export type ClockTask = (cycle: number) => void;

interface ScheduledTask {
  id: number;
  due: number;
  period: number | undefined;
  run: ClockTask;
}

export class SimulationClock {
  private cycle = 0;
  private nextId = 1;
  private tasks: ScheduledTask[] = [];

  /** Cycles elapsed since construction. */
  get cycles(): number {
    return this.cycle;
  }

  /** Number of tasks still scheduled. */
  get scheduled(): number {
    return this.tasks.length;
  }

  /** Runs `run` once when the clock reaches `cycle`. */
  at(cycle: number, run: ClockTask): number {
    return this.schedule(Math.max(this.cycle, cycle), undefined, run);
  }

  after(delta: number, run: ClockTask): number {
    return this.at(this.cycle + Math.max(0, delta), run);
  }

  /** Runs `run` every `period` cycles, first at now + period. */
  every(period: number, run: ClockTask): number {
    const safePeriod = Math.max(1, Math.floor(period));
    return this.schedule(this.cycle + safePeriod, safePeriod, run);
  }

  cancel(id: number): boolean {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter((task) => task.id !== id);
    return this.tasks.length !== before;
  }

  /**
   * Advances `count` cycles, one at a time, running each task on its exact
   * cycle. A task may schedule or cancel others while running.
   */
  tick(count = 1): void {
    for (let step = 0; step < count; step++) {
      this.cycle += 1;
      this.runDue();
    }
  }

  private runDue(): void {
    for (let head = this.tasks[0]; head !== undefined && head.due <= this.cycle; head = this.tasks[0]) {
      this.tasks.shift();
      if (head.period !== undefined) {
        head.due += head.period;
        this.insert(head);
      }
      head.run(this.cycle);
    }
  }

  private schedule(due: number, period: number | undefined, run: ClockTask): number {
    const task: ScheduledTask = { id: this.nextId++, due, period, run };
    this.insert(task);
    return task.id;
  }

  private insert(task: ScheduledTask): void {
    const index = this.tasks.findIndex((queued) => queued.due > task.due);
    if (index === -1) {
      this.tasks.push(task);
    } else {
      this.tasks.splice(index, 0, task);
    }
  }
}
