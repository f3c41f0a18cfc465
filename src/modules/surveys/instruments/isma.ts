import { InstrumentDefinition } from '../types';

// Callers send the canonical ids directly.
const QUESTION_IDS = [
  'sleep_enough',
  'appetite_change',
  'guilt_feeling',
  'overthinking',
  'focus_memory',
  'no_hobby_time',
  'muscle_pain',
  'addiction',
  'work_at_home',
  'enough_time',
  'ignore_problems',
  'perfectionist',
  'bad_time_estimate',
  'overwhelmed',
  'low_self_esteem',
  'impatient',
  'hurried',
  'road_rage',
  'competitive',
  'critical',
  'distracted',
  'low_libido',
  'teeth_grinding',
  'performance_drop',
];

export const isma: InstrumentDefinition = {
  name: 'isma',
  title: 'ISMA stress questionnaire',
  collection: 'isma_web',
  questions: QUESTION_IDS.map((id) => ({ id })),
  responseRange: { min: 0, max: 1 },
  boundary: 'lte',
  bands: [
    { threshold: 5, label: { mn: 'Стрессээр өвчлөх магадлал бага', en: 'low probability' } },
    { threshold: 10, label: { mn: 'Стрессээр өвчлөх магадлал өндөр', en: 'high probability' } },
    { threshold: null, label: { mn: 'Стрессийн түвшин маш өндөр байна', en: 'very high level' } },
  ],
};
