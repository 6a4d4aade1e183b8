import { readFile } from 'node:fs/promises'
import { parseCodingsCsv, parseDescriptionsCsv } from './csvParse'
import { createDictionary, type Dictionary, type DictionaryOptions } from './dictionary'

/** Read descriptions (and optionally codings) CSV files and build a Dictionary from them. */
export async function loadDictionary(
  descriptionsPath: string,
  codingsPath?: string,
  options?: DictionaryOptions
): Promise<Dictionary> {
  const [descriptionsCsv, codingsCsv] = await Promise.all([
    readFile(descriptionsPath, 'utf8'),
    codingsPath ? readFile(codingsPath, 'utf8') : Promise.resolve(undefined),
  ])
  const descriptions = parseDescriptionsCsv(descriptionsCsv)
  const codings = codingsCsv === undefined ? undefined : parseCodingsCsv(codingsCsv)
  return createDictionary(descriptions, codings, options)
}
