export class RecordVersion {
  private constructor(private readonly value: number) {}

  static from(value: number): RecordVersion {
    if (!Number.isInteger(value) || value < 1) {
      throw new Error('RecordVersion must be a positive integer');
    }
    return new RecordVersion(value);
  }

  static first(): RecordVersion {
    return new RecordVersion(1);
  }

  next(): RecordVersion {
    return new RecordVersion(this.value + 1);
  }

  unwrap(): number {
    return this.value;
  }
}
