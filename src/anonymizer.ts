import type { InstanceRef, ModelResponse } from './types.js';

/** A, B, …, Z, AA, AB, … */
export function labelForIndex(index: number): string {
  let n = index;
  let label = '';
  do {
    label = String.fromCharCode(65 + (n % 26)) + label;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return label;
}

function refKey(ref: InstanceRef): string {
  return `${ref.modelId}#${ref.instanceIndex}`;
}

/**
 * Run-scoped label ↔ (modelId, instanceIndex) map.
 * Labels follow the order responses were collected in.
 */
export class Anonymizer {
  private byLabel = new Map<string, InstanceRef>();
  private byRef = new Map<string, string>();

  static fromResponses(responses: readonly ModelResponse[]): Anonymizer {
    const anonymizer = new Anonymizer();
    responses.forEach((r, i) => {
      const label = labelForIndex(i);
      const ref = { modelId: r.modelId, instanceIndex: r.instanceIndex };
      anonymizer.byLabel.set(label, ref);
      anonymizer.byRef.set(refKey(ref), label);
    });
    return anonymizer;
  }

  get size(): number {
    return this.byLabel.size;
  }

  labels(): string[] {
    return [...this.byLabel.keys()];
  }

  has(label: string): boolean {
    return this.byLabel.has(label);
  }

  resolve(label: string): InstanceRef | undefined {
    const ref = this.byLabel.get(label);
    return ref ? { ...ref } : undefined;
  }

  labelFor(ref: InstanceRef): string | undefined {
    return this.byRef.get(refKey(ref));
  }

  toRecord(): Record<string, InstanceRef> {
    return Object.fromEntries([...this.byLabel].map(([label, ref]) => [label, { ...ref }]));
  }
}
