export class InvalidParameterError extends Error {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly value: unknown,
  ) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

export class InputShapeMismatchError extends Error {
  constructor(
    public readonly uLength: number,
    public readonly tLength: number,
  ) {
    super(`u has ${uLength} values but t has ${tLength} points`);
    this.name = 'InputShapeMismatchError';
  }
}
