import type { LabelTable } from '../types';

/**
 * Diagnosis labels, in the order of the classifier's output vector.
 */
export const DIAGNOSIS_LABELS: LabelTable = [
  {
    id: 'CONTROL',
    key: 'control',
    fullName: 'Normal Brain Scan',
    conditionName: 'Normal/Control',
    description: 'The brain scan appears normal with no signs of neurological disorders.',
    recommendation: 'Continue regular health monitoring. Maintain a healthy lifestyle with proper diet, exercise, and mental stimulation.'
  },
  {
    id: 'AD',
    key: 'alzheimer',
    fullName: "Alzheimer's Disease",
    conditionName: "Alzheimer's Disease",
    description: "The scan shows patterns consistent with Alzheimer's disease, characterized by brain tissue changes.",
    recommendation: 'Consult with a neurologist for comprehensive evaluation and potential treatment options. Early intervention may help manage symptoms.'
  },
  {
    id: 'PD',
    key: 'parkinson',
    fullName: "Parkinson's Disease",
    conditionName: "Parkinson's Disease",
    description: "The scan indicates patterns associated with Parkinson's disease, affecting movement and motor functions.",
    recommendation: 'Schedule an appointment with a movement disorder specialist. Physical therapy and medication may help manage symptoms.'
  }
];
