import { z } from 'zod'
import { silentLogger, type EnsembleLogger } from '@ensemble/core'
import { openDatabase, RecordStore, TableRecord } from '../src/index.js'

const BLANK = "can't be blank"

export const PersonSchema = z.object({
  name: z.string({ required_error: BLANK, invalid_type_error: BLANK }).min(1, BLANK)
})

export class Person extends TableRecord<typeof PersonSchema> {
  protected readonly table = 'people'
  protected readonly schema = PersonSchema

  name: string | undefined = undefined
}

export const TallySchema = z.object({
  anInt: z.number({ invalid_type_error: 'is not a number' }).int('must be an integer').optional()
})

export class Tally extends TableRecord<typeof TallySchema> {
  protected readonly table = 'tallies'
  protected readonly schema = TallySchema

  anInt: number | undefined = undefined
}

/**
 * Fresh in-memory database with the `people` and `tallies` tables.
 */
export async function createTestStore(logger: EnsembleLogger = silentLogger): Promise<RecordStore> {
  const database = await openDatabase()
  database.exec(`
    create table people (
      id integer primary key autoincrement,
      name text not null unique,
      constraint name_length check (length(name) <= 20)
    );
    create table tallies (
      id integer primary key autoincrement,
      "anInt" integer unique
    );
  `)
  return new RecordStore(database, { logger })
}
