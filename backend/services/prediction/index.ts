import { MODEL_CONFIG } from '../../config/model';
import { ModelLoader } from './ModelLoader';
import { ModelRegistry } from './ModelRegistry';
import { OnnxModelRuntime } from './OnnxModelRuntime';
import { PredictionPipeline } from './PredictionPipeline';

export const modelRegistry = new ModelRegistry(new ModelLoader(new OnnxModelRuntime(), MODEL_CONFIG));
export const predictionPipeline = new PredictionPipeline(modelRegistry);
