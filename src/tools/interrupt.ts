/**
 * Control-flow signal thrown by `ToolContext.interrupt()`.
 * The agent loop catches it and ends the run with an interrupt instead of an answer.
 */
export class InterruptSignal extends Error {
  public readonly value: string;

  constructor(value: string) {
    super('Run interrupted awaiting input');
    this.name = 'InterruptSignal';
    this.value = value;
  }
}
