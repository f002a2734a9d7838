// src/core/technicians/technician-resolver.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ConfigurationError } from '../common/errors';
import { ClientRecord, TechnicianClassification } from '../common/interfaces/models';
import { normalizeCompanyName, normalizePersonName } from '../normalization';
import { ALIAS_TABLE_TOKEN, AliasTableDefinition } from './alias-table';
import { ClientRegistryIndex, ITechnicianResolverService } from './interfaces/services';

export const UNASSIGNED_TECHNICIAN = 'Unassigned';

type AliasTarget =
    | { readonly kind: 'canonical'; readonly technician: string }
    | { readonly kind: 'specialCase' };

/** Indexes client records by strong company key; the first record for a key wins. */
export function buildClientRegistryIndex(clients: readonly ClientRecord[]): Map<string, ClientRecord> {
    const index = new Map<string, ClientRecord>();
    for (const client of clients) {
        const key = normalizeCompanyName(client.name);
        if (key && !index.has(key)) {
            index.set(key, client);
        }
    }
    return index;
}

@singleton()
@injectable()
export class TechnicianResolverService implements ITechnicianResolverService {
    private readonly aliases = new Map<string, AliasTarget>();
    private readonly canonicalNames: string[];

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(ALIAS_TABLE_TOKEN) aliasTable: AliasTableDefinition
    ) {
        for (const entry of aliasTable.technicians) {
            const target: AliasTarget = { kind: 'canonical', technician: entry.canonical };
            for (const spelling of [entry.canonical, ...entry.variants]) {
                this.register(spelling, target);
            }
        }
        for (const spelling of [aliasTable.specialCase.canonical, ...aliasTable.specialCase.variants]) {
            this.register(spelling, { kind: 'specialCase' });
        }
        this.canonicalNames = aliasTable.technicians.map(entry => entry.canonical).sort();
        this.logger.info(`TechnicianResolverService initialized with ${this.aliases.size} spellings for ${this.canonicalNames.length} technicians.`);
    }

    private register(spelling: string, target: AliasTarget): void {
        const key = normalizePersonName(spelling);
        if (!key) return;
        const existing = this.aliases.get(key);
        if (existing && !sameTarget(existing, target)) {
            throw new ConfigurationError(`Technician spelling "${spelling}" is assigned to more than one identity`);
        }
        this.aliases.set(key, target);
    }

    resolve(rawName: string | null | undefined): TechnicianClassification {
        const raw = (rawName ?? '').trim();
        const target = this.aliases.get(normalizePersonName(raw));
        if (!target) {
            return { kind: 'unknown', rawName: raw };
        }
        return target.kind === 'canonical'
            ? { kind: 'canonical', technician: target.technician }
            : { kind: 'specialCase', rawName: raw };
    }

    canonicalize(rawName: string | null | undefined): string {
        const classification = this.resolve(rawName);
        switch (classification.kind) {
            case 'canonical':
                return classification.technician;
            case 'specialCase':
                return UNASSIGNED_TECHNICIAN;
            case 'unknown':
                return classification.rawName || UNASSIGNED_TECHNICIAN;
        }
    }

    inferPrimaryTechnician(companyKey: string, registry: ClientRegistryIndex): string | null {
        if (!companyKey) return null;
        const recorded = registry.get(companyKey)?.primaryTechnician?.trim();
        if (!recorded) return null;

        const classification = this.resolve(recorded);
        switch (classification.kind) {
            case 'canonical':
                return classification.technician;
            case 'specialCase':
                // the registry names the marker itself, nothing to infer from
                this.logger.debug(`Registry entry for "${companyKey}" names the special-case technician as primary.`);
                return null;
            case 'unknown':
                return recorded;
        }
    }

    listCanonical(): string[] {
        return [...this.canonicalNames];
    }
}

function sameTarget(a: AliasTarget, b: AliasTarget): boolean {
    if (a.kind === 'canonical' && b.kind === 'canonical') {
        return a.technician === b.technician;
    }
    return a.kind === b.kind;
}
