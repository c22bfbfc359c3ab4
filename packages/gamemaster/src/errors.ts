/** A batch could not be completed: a worker failed, exited early or answered garbage. */
export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimulationError";
  }
}
