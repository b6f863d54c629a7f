/**
 * OnnxModelRuntime
 * Runs the exported classifier graph with ONNX Runtime (WebAssembly backend).
 */

import * as ort from 'onnxruntime-web';
import type { ImageTensor, ModelRuntime, ModelSession } from '../../types';

class OnnxModelSession implements ModelSession {
  constructor(private readonly session: ort.InferenceSession) {}

  get inputNames(): readonly string[] {
    return this.session.inputNames;
  }

  get outputNames(): readonly string[] {
    return this.session.outputNames;
  }

  async run(tensor: ImageTensor): Promise<Float32Array> {
    const inputName = this.session.inputNames[0];
    const outputName = this.session.outputNames[0];
    if (!inputName || !outputName) {
      throw new Error('Model graph has no input or output');
    }

    const input = new ort.Tensor('float32', tensor.data, [...tensor.shape]);
    const outputs = await this.session.run({ [inputName]: input });
    const output = outputs[outputName];
    if (!output) {
      throw new Error(`Model produced no "${outputName}" output`);
    }
    if (!(output.data instanceof Float32Array)) {
      throw new Error(`Unexpected output tensor type: ${output.type}`);
    }
    return output.data;
  }

  release(): Promise<void> {
    return this.session.release();
  }
}

export class OnnxModelRuntime implements ModelRuntime {
  readonly name = 'onnxruntime-web';

  constructor() {
    ort.env.wasm.numThreads = 1;
  }

  async createSession(modelBytes: Uint8Array): Promise<ModelSession> {
    const session = await ort.InferenceSession.create(modelBytes, {
      executionProviders: ['wasm'],
      graphOptimizationLevel: 'all'
    });
    return new OnnxModelSession(session);
  }
}
