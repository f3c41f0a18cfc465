import { InstrumentDefinition } from '../types';

export const fatigue: InstrumentDefinition = {
  name: 'fatigue',
  title: 'Chronic fatigue questionnaire',
  collection: 'fatigue',
  questions: [
    { id: 'sleep_disorder', key: 'Sleep Disorder' },
    { id: 'waking_fatigue', key: 'Waking Fatigue' },
    { id: 'focus_issue', key: 'Focus Issue' },
    { id: 'muscle_pain', key: 'Muscle Pain' },
    { id: 'body_pain', key: 'Body Pain' },
    { id: 'head_pain', key: 'Head Pain' },
    { id: 'neck_shoulder_stiffness', key: 'Neck Shoulder Stiffness' },
    { id: 'throat_pain', key: 'Throat Pain' },
    { id: 'motion_dizziness', key: 'Motion Dizziness' },
    { id: 'exercise_fatigue', key: 'Exercise Fatigue' },
    { id: 'eye_sensitivity', key: 'Eye Sensitivity' },
    { id: 'numb_sensation', key: 'Numb Sensation' },
    { id: 'anxiety_issue', key: 'Anxiety Issue' },
    { id: 'restless_sleep', key: 'Restless Sleep' },
    { id: 'cold_sensitivity', key: 'Cold Sensitivity' },
    { id: 'stomach_upset', key: 'Stomach Upset' },
    { id: 'allergic_reaction', key: 'Allergic Reaction' },
  ],
  responseRange: { min: 0, max: 4 },
  boundary: 'lte',
  bands: [
    { threshold: 10, label: { mn: 'Архаг ядаргаатай', en: 'chronic fatigue' } },
    { threshold: 24, label: { mn: 'Бага зэргийн архаг ядаргаатай', en: 'mild chronic fatigue' } },
    { threshold: 51, label: { mn: 'Дунд зэргийн архаг ядаргаатай', en: 'moderate chronic fatigue' } },
    { threshold: null, label: { mn: 'Хүнд зэргийн архаг ядаргаатай', en: 'severe chronic fatigue' } },
  ],
};
