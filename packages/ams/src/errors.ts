/** Base class for every error raised by the estimator. */
export class AmsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AmsError'
  }
}

/** Invalid parameters or missing collaborators, raised before any simulation. */
export class ConfigurationError extends AmsError {
  constructor(
    message: string,
    public readonly fields: Record<string, string[]> = {},
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** A collaborator returned data that does not match its contract. */
export class ContractViolation extends AmsError {
  constructor(
    public readonly collaborator: 'generator' | 'score' | 'regions',
    message: string,
  ) {
    super(`${collaborator}: ${message}`)
    this.name = 'ContractViolation'
  }
}

/** A trajectory has no defined step to take a level or restart from. */
export class DegenerateTrajectoryError extends AmsError {
  constructor(
    public readonly slot: number,
    message: string = `Trajectory ${slot} has no defined time step`,
  ) {
    super(message)
    this.name = 'DegenerateTrajectoryError'
  }
}
