/**
 * CSV export
 *
 * Writes the contract header followed by one record per current entity in
 * scope, sorted by key. The output imports back as a no-op.
 *
 * @module csv/export
 */

import type { Persistence, ScopeResolver } from '../types/collaborators'
import type { CsvContract } from '../types/csv'
import type { Snapshot } from '../types/snapshot'
import type { EngineConfig } from '../config'
import type { EntityTypeRegistry } from '../schema/registry'
import { isEntityReference, isReferenceList, valueOf, type EntityReference } from '../types/snapshot'
import { contractHeaders, toRecord } from './contract'
import { formatCsv } from './format'

export interface CsvExporterConfig {
  registry: EntityTypeRegistry
  persistence: Persistence
  scopeResolver?: ScopeResolver | undefined
  config: EngineConfig
}

export interface CsvExport {
  readonly csv: string
  /** Entities written (header excluded) */
  readonly count: number
}

export class CsvExporter {
  constructor(private readonly options: CsvExporterConfig) {}

  async export(entityType: string, scopeHint?: string): Promise<CsvExport> {
    const { registry, persistence, config } = this.options
    const contract = registry.contract(entityType)

    const snapshots = await persistence.list(entityType)
    const inScope: Snapshot[] = []
    for (const snapshot of snapshots) {
      if (await this.isInScope(contract, snapshot, scopeHint)) inScope.push(snapshot)
    }
    inScope.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))

    const records = [
      contractHeaders(contract),
      ...inScope.map(snapshot => toRecord(contract, snapshot, config.valueSeparator)),
    ]
    return { csv: formatCsv(records, config.csvDelimiter), count: inScope.length }
  }

  /**
   * An entity is in scope when the scope contains it, or, for contracts with
   * a scope field, when the scope contains one of the entities it references
   */
  private async isInScope(contract: CsvContract, snapshot: Snapshot, scopeHint: string | undefined): Promise<boolean> {
    const { scopeResolver } = this.options
    if (scopeHint === undefined || !scopeResolver) return true

    if (contract.scopeField === undefined) {
      return scopeResolver.contains(scopeHint, snapshot.entityType, snapshot.key)
    }

    const value = valueOf(snapshot.fields[contract.scopeField])
    const refs: EntityReference[] = isReferenceList(value) ? value : isEntityReference(value) ? [value] : []
    for (const ref of refs) {
      if (await scopeResolver.contains(scopeHint, ref.type, ref.name)) return true
    }
    return false
  }
}
