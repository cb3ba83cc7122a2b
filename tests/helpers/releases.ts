import type { Release } from '~/types'

let nextId = 1000

export function makeRelease(overrides: Partial<Release> = {}): Release {
  const id = overrides.id ?? nextId++
  return {
    id,
    artist: 'Test Artist',
    title: 'Test Title',
    year: 2001,
    url: `https://example.com/release/${id}`,
    dateAdded: null,
    format: null,
    label: null,
    ...overrides
  }
}

export const SOHN: Release = {
  id: 42,
  artist: 'SOHN',
  title: 'Albadas',
  year: 2023,
  url: 'https://example.com/release/42',
  dateAdded: '2024-03-01T10:00:00-08:00',
  format: 'Vinyl',
  label: '4AD'
}
