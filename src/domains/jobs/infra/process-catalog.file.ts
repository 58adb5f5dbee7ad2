import { readFile } from "node:fs/promises"
import { z } from "zod/mini"
import { parseOrThrow } from "../../../lib/errors"
import type { ProcessCatalog, ProcessDescription, ProviderDescription } from "../model/process.model"

const processSchema = z.object({
  id: z.string().check(z.minLength(1)),
  title: z.optional(z.string()),
  jobControlOptions: z.array(z.enum(["sync-execute", "async-execute"])),
  visibility: z._default(z.enum(["public", "private"]), "public"),
  isWorkflow: z._default(z.boolean(), false),
})

const catalogSchema = z.object({
  processes: z._default(z.array(processSchema), []),
  providers: z._default(
    z.array(
      z.object({
        id: z.string().check(z.minLength(1)),
        title: z.optional(z.string()),
        public: z._default(z.boolean(), true),
        processes: z._default(z.array(processSchema), []),
      }),
    ),
    [],
  ),
})

type CatalogEntry = z.infer<typeof processSchema>

type ProviderIndex = {
  provider: ProviderDescription
  processes: Map<string, ProcessDescription>
}

type CatalogIndex = {
  processes: Map<string, ProcessDescription>
  providers: Map<string, ProviderIndex>
}

export type CatalogSummary = {
  processes: number
  providers: number
}

export type FileProcessCatalogOptions = {
  file: string
}

function toProcess(entry: CatalogEntry, providerId?: string): ProcessDescription {
  return {
    id: entry.id,
    jobControlOptions: entry.jobControlOptions,
    visibility: entry.visibility,
    isWorkflow: entry.isWorkflow,
    ...(entry.title !== undefined && { title: entry.title }),
    ...(providerId !== undefined && { providerId }),
  }
}

function byId(entries: readonly CatalogEntry[], providerId?: string): Map<string, ProcessDescription> {
  return new Map(entries.map((entry): [string, ProcessDescription] => [entry.id, toProcess(entry, providerId)]))
}

/** Process catalog read once from a JSON file. */
export class FileProcessCatalog implements ProcessCatalog {
  private index: Promise<CatalogIndex> | undefined

  public constructor(private readonly opts: FileProcessCatalogOptions) {}

  /** Reads and validates the file; later calls reuse the first result. */
  async load(): Promise<CatalogSummary> {
    const index = await this.getIndex()
    return { processes: index.processes.size, providers: index.providers.size }
  }

  async getProcess(processId: string, providerId?: string): Promise<ProcessDescription | undefined> {
    const index = await this.getIndex()
    if (providerId === undefined) return index.processes.get(processId)

    return index.providers.get(providerId)?.processes.get(processId)
  }

  async getProvider(providerId: string): Promise<ProviderDescription | undefined> {
    const index = await this.getIndex()
    return index.providers.get(providerId)?.provider
  }

  private getIndex(): Promise<CatalogIndex> {
    this.index ??= this.read()
    return this.index
  }

  private async read(): Promise<CatalogIndex> {
    const raw: unknown = JSON.parse(await readFile(this.opts.file, "utf8"))
    const catalog = parseOrThrow(catalogSchema, raw)

    return {
      processes: byId(catalog.processes),
      providers: new Map(
        catalog.providers.map((entry): [string, ProviderIndex] => [
          entry.id,
          {
            provider: {
              id: entry.id,
              public: entry.public,
              ...(entry.title !== undefined && { title: entry.title }),
            },
            processes: byId(entry.processes, entry.id),
          },
        ]),
      ),
    }
  }
}
