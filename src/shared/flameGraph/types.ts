export const ROOT_NAME = 'root';

export type FlameGraphNode = {
  name: string;
  value: number; // sum of every sample whose stack passes through this node
  children: Map<string, FlameGraphNode>;
};

export type SerializedFlameGraphNode = {
  name: string;
  value: number;
  children: SerializedFlameGraphNode[];
};

/**
 * One call stack with the value of the selected series.
 * Frames are root-first: `frames[0]` is the outermost caller, the last entry is where the sample was taken.
 */
export type StackSample = {
  frames: readonly string[];
  value: number;
};

export class SerializationError extends Error {
  readonly path: readonly string[];

  constructor(message: string, path: readonly string[]) {
    super(`${message} at ${path.join(' > ')}`);
    this.name = 'SerializationError';
    this.path = path;
  }
}
