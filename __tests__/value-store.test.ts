import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { openValuesDatabase, type DatabaseHandle } from '@/lib/db/client'
import { PersistenceUnavailableError } from '@/lib/errors'
import { SqliteValueStore } from '@/lib/value-store'

const T1 = new Date('2024-09-01T12:00:00Z')
const T2 = new Date('2024-09-02T12:00:00Z')

describe('SqliteValueStore', () => {
  let handle: DatabaseHandle
  let clock: Date
  let store: SqliteValueStore

  beforeEach(() => {
    handle = openValuesDatabase(':memory:')
    clock = T1
    store = new SqliteValueStore(handle.db, () => clock)
  })

  afterEach(() => {
    handle.close()
  })

  it('writes a batch and loads it back', async () => {
    const written = await store.upsertMany(
      new Map([
        ['Justin Jefferson', 9800],
        ['Bijan Robinson', 9100.5],
      ])
    )
    expect(written).toBe(2)

    const all = await store.loadAll()
    expect(all).toEqual(
      new Map([
        ['Bijan Robinson', 9100.5],
        ['Justin Jefferson', 9800],
      ])
    )
  })

  it('overwrites an existing name without error', async () => {
    await store.upsert('Tyreek Hill', 7000)
    clock = T2
    await store.upsert('Tyreek Hill', 6500)

    expect(await store.listAll()).toEqual([{ playerName: 'Tyreek Hill', value: 6500, lastUpdated: T2 }])
  })

  it('never moves lastUpdated backwards', async () => {
    clock = T2
    await store.upsert('Tyreek Hill', 7000)
    clock = T1
    await store.upsert('Tyreek Hill', 6900)

    const [record] = await store.listAll()
    expect(record.value).toBe(6900)
    expect(record.lastUpdated.getTime()).toBe(T2.getTime())
  })

  it('finds names containing a fragment, ordered by name', async () => {
    await store.upsertMany([
      ['Zack Moss', 1200],
      ['Moses Brown', 50],
      ['Josh Allen', 8000],
    ])

    expect(await store.findLike('mos')).toEqual(['Moses Brown', 'Zack Moss'])
    expect(await store.findLike('Nobody')).toEqual([])
  })

  it('treats LIKE wildcards in the fragment as literal characters', async () => {
    await store.upsertMany([
      ['Test_Player', 100],
      ['TestXPlayer', 200],
    ])

    expect(await store.findLike('t_P')).toEqual(['Test_Player'])
    expect(await store.findLike('%')).toEqual([])
  })

  it('lists every record ordered by name', async () => {
    await store.upsertMany([
      ['Zack Moss', 1200],
      ['Amon-Ra St. Brown', 8500],
    ])

    const names = (await store.listAll()).map((r) => r.playerName)
    expect(names).toEqual(['Amon-Ra St. Brown', 'Zack Moss'])
  })

  it('raises PersistenceUnavailableError when the database is gone', async () => {
    handle.close()
    await expect(store.upsert('Josh Allen', 8000)).rejects.toBeInstanceOf(PersistenceUnavailableError)
    await expect(store.loadAll()).rejects.toBeInstanceOf(PersistenceUnavailableError)
  })
})
