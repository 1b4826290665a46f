import mongoose, { Schema } from 'mongoose';

// Named sequences for human-friendly integer ids ("serviceRequest" -> 1, 2, 3...).
const counterSchema = new Schema(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  { versionKey: false }
);

export const CounterModel = mongoose.model('Counter', counterSchema);

export async function nextSequence(name: string): Promise<number> {
  const counter = await CounterModel.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true, lean: true }
  );
  if (!counter) throw new Error(`Counter ${name} could not be incremented`);
  return counter.seq;
}
