/**
 * Test Suite for model persistence.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
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
import { ModelFormatError, TrainingError, UnknownActivationError } from '../src/errors';
import { createRng } from '../src/math/random';
import { NeuralNetwork } from '../src/nn/network';
import {
  deserializeNetwork,
  fromModel,
  loadNetwork,
  saveNetwork,
  serializeNetwork,
  toModel,
} from '../src/persistence/serialize';

const probes = [
  [0, 0, 0],
  [1, -1, 0.5],
  [0.25, 0.75, -2],
  [10, -10, 3],
];

function trained(activations: Activation[], seed: number): NeuralNetwork {
  const sizes = [3, ...activations.slice(1).map(() => 4), 2];
  const net = new NeuralNetwork(sizes, activations, { rng: createRng(seed) });
  for (let i = 0; i < 10; i++) net.trainBatch(probes, probes.map(() => [1, 0]), 0.2);
  return net;
}

describe('serialization', () => {
  const activationSets: Activation[][] = [
    [new ReLU(), new Softmax()],
    [new Sigmoid(), new ReLU(), new Softmax()],
    [new Tanh(), new LeakyReLU(0.2), new Sigmoid()],
    [new ELU(0.5), new Swish(), new Linear()],
  ];

  activationSets.forEach((acts, i) => {
    const label = acts.map((a) => a.kind).join('/');
    it(`should reproduce predictions bit for bit (${label})`, () => {
      const net = trained(acts, 100 + i);
      const restored = deserializeNetwork(serializeNetwork(net));
      for (const x of probes) {
        expect(restored.predict(x)).toEqual(net.predict(x));
      }
    });
  });

  it('should write one record per layer with the activation tag', () => {
    const net = new NeuralNetwork([2, 3, 2], [new LeakyReLU(0.05), new Softmax()], {
      rng: createRng(1),
    });
    const model = toModel(net);
    expect(model.layers).toHaveLength(2);
    expect(model.layers[0]!.activation).toBe('leaky_relu');
    expect(model.layers[0]!.alpha).toBe(0.05);
    expect(model.layers[0]!.weights).toEqual(net.layers[0]!.weights);
    expect(model.layers[1]!.activation).toBe('softmax');
    expect(model.layers[1]).not.toHaveProperty('alpha');
    expect(model.layers[1]!.biases).toEqual([0, 0]);
  });

  it('should refuse to snapshot non-finite parameters', () => {
    const net = new NeuralNetwork([2, 2], [new Softmax()], { rng: createRng(1) });
    net.layers[0]!.weights[0]![0] = Infinity;
    expect(() => toModel(net)).toThrow(ModelFormatError);
    expect(() => serializeNetwork(net)).toThrow('layer 0 has non-finite parameters');

    net.layers[0]!.weights[0]![0] = 0.5;
    net.layers[0]!.biases[1] = NaN;
    expect(() => toModel(net)).toThrow(ModelFormatError);
  });

  it('should reject alpha values that are not positive', () => {
    const record = { weights: [[1]], biases: [0], activation: 'leaky_relu' };
    expect(() => fromModel({ layers: [{ ...record, alpha: -0.5 }] })).toThrow(ModelFormatError);
    expect(() => fromModel({ layers: [{ ...record, alpha: 0 }] })).toThrow(ModelFormatError);
    expect(fromModel({ layers: [{ ...record, alpha: 0.3 }] }).layers[0]!.activation.alpha).toBe(0.3);
  });

  it('should reject alpha on activations that take none', () => {
    for (const activation of ['relu', 'sigmoid', 'Softmax']) {
      const model = { layers: [{ weights: [[1]], biases: [0], activation, alpha: 0.2 }] };
      expect(() => fromModel(model)).toThrow('alpha is only allowed for leaky_relu and elu');
    }
    const elu = { layers: [{ weights: [[1]], biases: [0], activation: 'ELU', alpha: 0.2 }] };
    expect(fromModel(elu).layers[0]!.activation.alpha).toBe(0.2);
  });

  it('should not share arrays with the network', () => {
    const net = new NeuralNetwork([2, 2], [new Sigmoid()], { rng: createRng(1) });
    const model = toModel(net);
    model.layers[0]!.weights[0]![0] = 123;
    expect(net.layers[0]!.weights[0]![0]).not.toBe(123);
  });

  it('should load a network with no forward cache', () => {
    const net = new NeuralNetwork([2, 2], [new Sigmoid()], { rng: createRng(1) });
    const restored = fromModel(toModel(net));
    expect(() => restored.layers[0]!.backward([1, 1], 0.1)).toThrow(TrainingError);
  });

  it('should accept tags regardless of case', () => {
    const net = fromModel({
      layers: [{ weights: [[1, 0], [0, 1]], biases: [0, 0], activation: 'ReLU' }],
    });
    expect(net.layers[0]!.activation.kind).toBe('relu');
    expect(net.predict([-1, 2])).toEqual([0, 2]);
  });

  it('should fail on an unknown activation tag', () => {
    const model = { layers: [{ weights: [[1]], biases: [0], activation: 'gelu' }] };
    expect(() => fromModel(model)).toThrow(UnknownActivationError);
  });

  it('should fail on layers that do not chain', () => {
    const model = {
      layers: [
        { weights: [[1, 2]], biases: [0], activation: 'relu' },
        { weights: [[1, 2]], biases: [0], activation: 'softmax' },
      ],
    };
    expect(() => fromModel(model)).toThrow(ModelFormatError);
  });

  it('should fail on malformed documents', () => {
    expect(() => fromModel({})).toThrow(ModelFormatError);
    expect(() => fromModel({ layers: [] })).toThrow(ModelFormatError);
    expect(() =>
      fromModel({ layers: [{ weights: [[1, 2], [3]], biases: [0, 0], activation: 'relu' }] }),
    ).toThrow(ModelFormatError);
    expect(() =>
      fromModel({ layers: [{ weights: [[1]], biases: [0, 0], activation: 'relu' }] }),
    ).toThrow(ModelFormatError);
    expect(() => deserializeNetwork('{not json')).toThrow(ModelFormatError);
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ffnet-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should save and load through a JSON file', async () => {
      const net = trained([new ReLU(), new Softmax()], 4);
      const file = path.join(dir, 'model.json');
      await saveNetwork(net, file);

      const raw: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
      expect(raw).toEqual(toModel(net));

      const loaded = await loadNetwork(file);
      for (const x of probes) expect(loaded.predict(x)).toEqual(net.predict(x));
    });

    it('should reject a file that is not a model', async () => {
      const file = path.join(dir, 'bad.json');
      await fs.writeFile(file, JSON.stringify({ layers: 'nope' }));
      await expect(loadNetwork(file)).rejects.toThrow(ModelFormatError);
    });
  });
});
