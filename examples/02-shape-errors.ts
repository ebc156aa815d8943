import { DTypeError, EdslError, Program, TensorGraph } from '@einsum-ir/core';

function report(label: string, build: () => unknown): void {
  try {
    build();
    console.log(`${label}: ok`);
  } catch (error) {
    if (error instanceof EdslError) {
      console.log(`${label}: ${error.name}: ${error.message}`);
    } else {
      throw error;
    }
  }
}

const g = new TensorGraph();
const a = g.placeholder('float32', [3]);
const b = g.placeholder('float32', [4]);

// [3] and [4] cannot broadcast
report('broadcast', () => a.add(b).computeShape());

// 3 elements do not fill [2, 2]
report('reshape', () => new Program('reshape', [a.reshape(2, 2)]));

// Outputs may widen but never narrow
report('narrow', () => new Program('narrow', [{ tensor: a, dtype: 'int32' }]));

// A negative literal has no uint64 representation
report('literal', () => {
  try {
    return new Program('literal', [a.mul(-2)], { intType: 'uint64' });
  } catch (error) {
    if (error instanceof DTypeError) {
      console.log('  context:', error.context);
    }
    throw error;
  }
});
