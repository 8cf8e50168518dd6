import { Insight } from '../../src/store';

export const insight = (overrides: Partial<Insight> = {}): Insight => ({
    id: '20240315-142233-aaaaaa',
    createdAt: '2024-03-15T14:22:33.000Z',
    title: 'Gardening teaches patience',
    tags: ['garden', 'patience'],
    transcript: 'Gardening teaches patience. #garden You plant now and wait. #patience',
    capsule: 'Patience is a practice: the garden rewards waiting.',
    drafts: [],
    sourceAudioPath: null,
    ...overrides,
});

export const gardening = insight();

export const coffee = insight({
    id: '20240316-090000-bbbbbb',
    createdAt: '2024-03-16T09:00:00.000Z',
    title: 'Cold [brew] notes',
    tags: [],
    transcript: 'Cold brew needs twelve hours.',
    capsule: 'Slow extraction gives a smoother cup.',
    sourceAudioPath: '/data/audio/20240316-090000-bbbbbb.wav',
});
