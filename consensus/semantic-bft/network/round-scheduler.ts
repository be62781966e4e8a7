// consensus/semantic-bft/network/round-scheduler.ts
// Drives simulated time forward in fixed rounds and fires periodic tasks

import { EventEmitter } from 'events';
import winston from 'winston';

export interface RoundContext {
  round: number;
  now: number;
}

export interface RoundParticipant {
  onRound(context: RoundContext): void | Promise<void>;
}

export interface Settleable {
  settle(): Promise<void>;
}

export type PeriodicTask = (now: number) => void | Promise<void>;

interface ScheduledTask {
  name: string;
  interval: number;
  nextDue: number;
  task: PeriodicTask;
  runs: number;
}

export interface RoundSchedulerOptions {
  roundDuration: number;
  logger: winston.Logger;
  fabric?: Settleable;
}

export class RoundScheduler extends EventEmitter {
  private participants: RoundParticipant[] = [];
  private tasks: ScheduledTask[] = [];
  private roundsCompleted = 0;
  private readonly roundDuration: number;
  private readonly logger: winston.Logger;
  private readonly fabric?: Settleable;

  constructor(options: RoundSchedulerOptions) {
    super();
    if (!(options.roundDuration > 0)) {
      throw new Error(`Round duration must be positive, got ${options.roundDuration}`);
    }
    this.roundDuration = options.roundDuration;
    this.logger = options.logger;
    this.fabric = options.fabric;
  }

  public addParticipant(participant: RoundParticipant): void {
    this.participants.push(participant);
  }

  /**
   * Run `task` each time `interval` of simulated time has elapsed,
   * whatever the transaction volume
   */
  public every(interval: number, task: PeriodicTask, name: string = 'periodic'): void {
    if (!(interval > 0)) {
      throw new Error(`Periodic task ${name} needs a positive interval, got ${interval}`);
    }
    this.tasks.push({ name, interval, nextDue: interval, task, runs: 0 });
  }

  /**
   * Run `rounds` rounds. Each round fires due periodic tasks, gives every
   * participant its turn in registration order, then waits for delivery to settle.
   */
  public async run(rounds: number): Promise<number> {
    for (let i = 0; i < rounds; i++) {
      const round = this.roundsCompleted;
      const now = round * this.roundDuration;
      this.emit('round:started', { round, now });

      await this.firePeriodicTasks(now);

      for (const participant of this.participants) {
        await participant.onRound({ round, now });
      }

      if (this.fabric) {
        await this.fabric.settle();
      }

      this.roundsCompleted++;
      this.emit('round:completed', { round, now });
    }

    this.logger.debug(`Completed ${rounds} rounds`, { elapsed: this.getElapsedTime() });
    return this.getElapsedTime();
  }

  public getElapsedTime(): number {
    return this.roundsCompleted * this.roundDuration;
  }

  public getRoundsCompleted(): number {
    return this.roundsCompleted;
  }

  public getTaskRuns(name: string): number {
    return this.tasks
      .filter(task => task.name === name)
      .reduce((sum, task) => sum + task.runs, 0);
  }

  private async firePeriodicTasks(now: number): Promise<void> {
    for (const scheduled of this.tasks) {
      while (scheduled.nextDue <= now) {
        scheduled.nextDue += scheduled.interval;
        scheduled.runs++;
        this.emit('task:fired', { name: scheduled.name, now });
        await scheduled.task(now);
      }
    }
  }
}
