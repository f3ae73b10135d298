/**
 * A fault raised by compiled-program runtime helpers. Faults stop the running
 * program: callers are not expected to recover from one, and the emitted C
 * counterpart (`panic`) exits the process instead of throwing.
 */
export class RuntimeFault extends Error {
  readonly fatal = true;

  constructor(message: string) {
    super(`panic: ${message}!`);
    this.name = "RuntimeFault";
  }
}

export const panic = (message: string): never => {
  throw new RuntimeFault(message);
};

export const isRuntimeFault = (error: unknown): error is RuntimeFault =>
  error instanceof RuntimeFault;
