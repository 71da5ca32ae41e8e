import { DrawInput, Person } from '../../src/engine';

export const people = (...names: string[]): Person[] =>
  names.map((name) => ({ name, email: `${name.toLowerCase()}@example.com` }));

/** The sample configuration: whitelist and blacklist name the same pair */
export const sampleDraw = (): DrawInput => ({
  people: people('John', 'Sean', 'Shane'),
  whitelist: [{ giver: 'Sean', receiver: 'Shane' }],
  blacklist: [{ giver: 'Sean', receiver: 'Shane' }],
  blacklist_sets: [['John', 'Sean']],
  history: [
    {
      year: 2024,
      exclude_pairs: true,
      pairs: [
        { giver: 'John', receiver: 'Shane' },
        { giver: 'Sean', receiver: 'John' },
        { giver: 'Shane', receiver: 'Sean' },
      ],
    },
  ],
});

/** Six people, two households, one forced pair; several valid draws exist */
export const familyDraw = (): DrawInput => ({
  people: people('Ann', 'Ben', 'Cat', 'Dan', 'Eve', 'Fay'),
  whitelist: [{ giver: 'Fay', receiver: 'Ann' }],
  blacklist: [{ giver: 'Eve', receiver: 'Fay' }],
  blacklist_sets: [
    ['Ann', 'Ben'],
    ['Cat', 'Dan'],
  ],
  history: [
    {
      year: 2024,
      exclude_pairs: true,
      pairs: [
        { giver: 'Ann', receiver: 'Cat' },
        { giver: 'Ben', receiver: 'Eve' },
      ],
    },
  ],
});
