/**
 * TensorFlow.js leaf classifier
 *
 * Loads a Layers model exported by the TensorFlow.js converter:
 *   <modelDir>/model.json      topology + weights manifest
 *   <modelDir>/*.bin           weight shards
 *   <modelDir>/metadata.json   { "labels": [...] } in output-index order
 *
 * Images are decoded and resized with sharp, scaled to [0, 1] and run through
 * the model; the arg-max class and its probability form the prediction.
 */

import * as tf from '@tensorflow/tfjs';
import sharp from 'sharp';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { Classifier, ClassifierLoader, Prediction } from './inferenceAdapter';

const weightDtypeSchema = z.enum(['float32', 'int32', 'bool']);

// Converter output with --quantize_uint8/uint16/float16; tfjs dequantizes on load
const quantizationSchema = z.object({
  dtype: z.enum(['uint8', 'uint16', 'float16']),
  scale: z.number().optional(),
  min: z.number().optional(),
  original_dtype: weightDtypeSchema.optional(),
}).refine(
  quantization => quantization.dtype === 'float16' || (quantization.scale !== undefined && quantization.min !== undefined),
  { message: 'uint8 and uint16 quantization need min and scale' },
);

const weightEntrySchema = z.object({
  name: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  dtype: weightDtypeSchema,
  quantization: quantizationSchema.optional(),
});

const modelJsonSchema = z.object({
  modelTopology: z.record(z.unknown()),
  weightsManifest: z.array(z.object({
    paths: z.array(z.string().min(1)),
    weights: z.array(weightEntrySchema),
  })),
});

const metadataSchema = z.object({
  labels: z.array(z.string().min(1)).min(1),
});

interface InputSize {
  height: number;
  width: number;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(file, 'utf-8'));
}

function concatShards(shards: Buffer[]): ArrayBuffer {
  const total = shards.reduce((sum, shard) => sum + shard.length, 0);
  const weightData = new ArrayBuffer(total);
  const view = new Uint8Array(weightData);
  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.length;
  }
  return weightData;
}

function readInputSize(model: tf.LayersModel): InputSize {
  const shape = model.inputs[0]?.shape;
  // Expect [batch, height, width, 3]
  if (!shape || shape.length !== 4 || shape[3] !== 3) {
    throw new Error(`Unsupported model input shape: ${JSON.stringify(shape)}`);
  }
  const [, height, width] = shape;
  if (typeof height !== 'number' || typeof width !== 'number') {
    throw new Error('Model input must have a fixed height and width');
  }
  return { height, width };
}

export class TfjsClassifier implements Classifier {
  private readonly inputSize: InputSize;

  constructor(
    private readonly model: tf.LayersModel,
    private readonly labels: readonly string[],
  ) {
    this.inputSize = readInputSize(model);
  }

  async classify(image: Buffer): Promise<Prediction> {
    const { height, width } = this.inputSize;

    const { data, info } = await sharp(image)
      .removeAlpha()
      .toColourspace('srgb')
      .resize(width, height, { fit: 'fill' })
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3) {
      throw new Error(`Expected 3 colour channels, got ${info.channels}`);
    }

    const pixels = Float32Array.from(data, value => value / 255);
    const output = tf.tidy(() => {
      const input = tf.tensor4d(pixels, [1, height, width, 3]);
      const prediction = this.model.predict(input);
      return Array.isArray(prediction) ? prediction[0] : prediction;
    });

    let scores: Float32Array | Int32Array | Uint8Array;
    try {
      scores = await output.data();
    } finally {
      output.dispose();
    }

    let bestIndex = 0;
    for (let i = 1; i < scores.length; i++) {
      if (scores[i] > scores[bestIndex]) bestIndex = i;
    }

    const label = this.labels[bestIndex];
    if (label === undefined) {
      throw new Error(`Model produced class ${bestIndex} but only ${this.labels.length} labels are defined`);
    }

    return { label, confidence: scores[bestIndex] };
  }
}

/**
 * Builds a classifier from a converter export directory. Returns null when the
 * directory holds no model so the adapter can fall back to degraded mode.
 */
export async function loadTfjsClassifier(modelDir: string): Promise<TfjsClassifier | null> {
  const modelJsonPath = path.join(modelDir, 'model.json');
  if (!(await pathExists(modelJsonPath))) {
    return null;
  }

  const modelJson = modelJsonSchema.parse(await readJson(modelJsonPath));
  const metadata = metadataSchema.parse(await readJson(path.join(modelDir, 'metadata.json')));

  const shards: Buffer[] = [];
  const weightSpecs: tf.io.WeightsManifestEntry[] = [];
  for (const group of modelJson.weightsManifest) {
    for (const shardPath of group.paths) {
      shards.push(await fs.readFile(path.join(modelDir, shardPath)));
    }
    weightSpecs.push(...group.weights);
  }

  const model = await tf.loadLayersModel(tf.io.fromMemory({
    modelTopology: modelJson.modelTopology,
    weightSpecs,
    weightData: concatShards(shards),
  }));

  const outputUnits = model.outputs[0]?.shape[1];
  if (typeof outputUnits === 'number' && outputUnits !== metadata.labels.length) {
    throw new Error(`Model has ${outputUnits} output classes but metadata lists ${metadata.labels.length} labels`);
  }

  return new TfjsClassifier(model, metadata.labels);
}

export function tfjsClassifierLoader(modelDir: string): ClassifierLoader {
  return () => loadTfjsClassifier(modelDir);
}
