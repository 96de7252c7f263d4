// Barrel exports for the library API

// Core types and errors
export { Vector, Matrix, RandomSource, LossResult, LossFunction } from "./types";
export {
  NetworkError,
  ConstructionError,
  ShapeMismatchError,
  EmptyVectorError,
  UnknownActivationError,
  ModelFormatError,
  TrainingError,
  ConfigError,
} from "./errors";

// Activations
export {
  Activation,
  ActivationKind,
  ACTIVATION_KINDS,
  Sigmoid,
  ReLU,
  LeakyReLU,
  Tanh,
  Linear,
  ELU,
  Swish,
  Softmax,
  activationFromTag,
  activationTag,
  isActivationKind,
  isVectorWide,
} from "./activation/activations";

// Losses
export { crossEntropyLoss, mseLoss, CROSS_ENTROPY_EPSILON } from "./loss/loss";

// Layers and networks
export { Layer, LayerCache } from "./nn/layer";
export {
  NeuralNetwork,
  NetworkOptions,
  EvaluationResult,
  LayerSummary,
} from "./nn/network";
export { gradientCheck, GradientCheckReport, GradientCheckEntry } from "./nn/gradientCheck";

// Math utilities
export { createRng, uniform, shuffledIndices } from "./math/random";
export {
  dot,
  add,
  subtract,
  hadamard,
  outer,
  mean,
  normalize,
  argMax,
  accuracy,
  hasNonFinite,
  zeros,
  zerosLike,
} from "./math/vector";

// Persistence
export {
  toModel,
  fromModel,
  serializeNetwork,
  deserializeNetwork,
  saveNetwork,
  loadNetwork,
} from "./persistence/serialize";
export { PersistedModel, LayerRecord, parsePersistedModel } from "./persistence/modelShape";

// Training
export { Trainer, FitOptions, FitResult, parseFitOptions } from "./training/trainer";
export { TrainingObserver, EpochMetrics } from "./observers/types";
export { ConsoleLogger } from "./observers/consoleLogger";
export { MetricsCollector } from "./observers/metricsCollector";

// TF.js interop
export { toTfModel, predictWithTf } from "./interop/tfjs";
