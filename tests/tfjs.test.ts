/**
 * Test Suite for the TensorFlow.js export.
 */

import {
  Activation,
  ELU,
  LeakyReLU,
  Linear,
  ReLU,
  Sigmoid,
  Softmax,
  Swish,
  Tanh,
} from '../src/activation/activations';
import { predictWithTf, toTfModel } from '../src/interop/tfjs';
import { createRng } from '../src/math/random';
import { NeuralNetwork } from '../src/nn/network';

const probes = [
  [0, 0, 0],
  [0.5, -0.5, 1],
  [-1, 0.25, 0.75],
];

function build(activations: Activation[], seed: number): NeuralNetwork {
  const sizes = [3, ...activations.slice(1).map(() => 5), 2];
  const net = new NeuralNetwork(sizes, activations, { rng: createRng(seed) });
  // Move biases off zero so they are exercised too.
  for (let i = 0; i < 5; i++) net.trainBatch(probes, probes.map(() => [0, 1]), 0.5);
  return net;
}

function expectParity(net: NeuralNetwork): void {
  const model = toTfModel(net);
  const tfOut = predictWithTf(model, probes);
  probes.forEach((x, row) => {
    const expected = net.predict(x);
    expect(tfOut[row]).toHaveLength(expected.length);
    expected.forEach((v, i) => expect(tfOut[row]![i]).toBeCloseTo(v, 4));
  });
  model.dispose();
}

describe('toTfModel', () => {
  it('should match predictions for relu and softmax', () => {
    expectParity(build([new ReLU(), new Softmax()], 1));
  });

  it('should match predictions for parametrized activations', () => {
    expectParity(build([new LeakyReLU(0.2), new ELU(0.5), new Sigmoid()], 2));
  });

  it('should match predictions for tanh and linear', () => {
    expectParity(build([new Tanh(), new Linear()], 3));
  });

  it('should match predictions for swish and default-alpha ELU', () => {
    expectParity(build([new Swish(), new ELU(), new Softmax()], 4));
  });

  it('should add a separate layer after each parametrized activation', () => {
    const model = toTfModel(build([new LeakyReLU(0.2), new ELU(0.5), new Sigmoid()], 2));
    expect(model.layers.map((l) => l.getClassName())).toEqual([
      'Dense',
      'LeakyReLU',
      'Dense',
      'ScaledELU',
      'Dense',
    ]);
    model.dispose();
  });

  it('should keep default-alpha ELU inside the dense layer', () => {
    const model = toTfModel(build([new ELU(), new Softmax()], 5));
    expect(model.layers.map((l) => l.getClassName())).toEqual(['Dense', 'Dense']);
    model.dispose();
  });
});
