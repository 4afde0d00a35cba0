import { ValidationError } from "../utils/errors";

/** Named values flowing into and out of a node */
export type NodeData = Record<string, unknown>;

export interface NodeDescriptor {
  readonly name: string;
  readonly description: string;
  /** Required input names, checked before every run */
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
}

/**
 * Base class for all pipeline nodes.
 * A node must treat its inputs as read-only: siblings may hold the same objects.
 */
export abstract class Node<TOutput extends NodeData = NodeData> {
  readonly descriptor: NodeDescriptor;

  constructor(descriptor: NodeDescriptor) {
    this.descriptor = Object.freeze({
      name: descriptor.name,
      description: descriptor.description.trim(),
      inputs: Object.freeze([...descriptor.inputs]),
      outputs: Object.freeze([...descriptor.outputs]),
    });
  }

  get name(): string {
    return this.descriptor.name;
  }

  get inputs(): readonly string[] {
    return this.descriptor.inputs;
  }

  get outputs(): readonly string[] {
    return this.descriptor.outputs;
  }

  abstract run(inputs: NodeData): Promise<TOutput>;

  /**
   * Throws on the first declared input that is missing
   */
  validateInput(data: NodeData): void {
    for (const field of this.inputs) {
      if (!(field in data) || data[field] === undefined) {
        throw new ValidationError(`Missing required input: ${field}`, {
          node_name: this.name,
          missing_field: field,
        });
      }
    }
  }

  describe(): { name: string; type: string; description: string; inputs: readonly string[]; outputs: readonly string[] } {
    return {
      name: this.name,
      type: this.constructor.name,
      description: this.descriptor.description,
      inputs: this.inputs,
      outputs: this.outputs,
    };
  }
}
