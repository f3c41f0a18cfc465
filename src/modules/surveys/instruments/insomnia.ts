import { InstrumentDefinition } from '../types';

export const insomnia: InstrumentDefinition = {
  name: 'insomnia',
  title: 'Insomnia severity index',
  collection: 'insomnia_web',
  questions: [
    { id: 'fall_asleep', key: 'Fall Asleep' },
    { id: 'stay_asleep', key: 'Stay Asleep' },
    { id: 'early_rising', key: 'Early Rising' },
    { id: 'sleep_satisfaction', key: 'Sleep Satisfaction' },
    { id: 'daily_impact', key: 'Daily Impact' },
    { id: 'life_quality', key: 'Life Quality' },
    { id: 'sleep_concern', key: 'Sleep Concern' },
  ],
  responseRange: { min: 0, max: 4 },
  boundary: 'lt',
  bands: [
    { threshold: 8, label: { mn: 'Нойргүйдэл байхгүй', en: 'none' } },
    { threshold: 15, label: { mn: 'Нойргүйдлийн зэрэг бага', en: 'mild' } },
    { threshold: 22, label: { mn: 'Дунд зэргийн нойргүйдэлтэй', en: 'moderate' } },
    { threshold: null, label: { mn: 'Нойргүйдлийн зэрэг хүнд явцтай', en: 'severe' } },
  ],
};
