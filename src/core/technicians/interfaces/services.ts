// src/core/technicians/interfaces/services.ts
import { ClientRecord, TechnicianClassification } from '../../common/interfaces/models';

/** Client registry entries keyed by strong company key */
export type ClientRegistryIndex = ReadonlyMap<string, ClientRecord>;

/** Defines the contract for resolving technician spellings */
export interface ITechnicianResolverService {
    /**
     * Classifies a raw spelling as a canonical technician, the special-case
     * identity or unknown. Blank input is unknown.
     */
    resolve(rawName: string | null | undefined): TechnicianClassification;

    /**
     * Maps a spelling to the key used in per-technician breakdowns:
     * the canonical name for known aliases, "Unassigned" for blank input and
     * for the special-case identity, the trimmed text otherwise.
     */
    canonicalize(rawName: string | null | undefined): string;

    /**
     * Infers who really did the special-case identity's work on a company:
     * the primary technician recorded in the client registry.
     * @param companyKey - Strong company key of the fact.
     * @returns The technician name, or null when the registry cannot tell.
     */
    inferPrimaryTechnician(companyKey: string, registry: ClientRegistryIndex): string | null;

    /** Canonical technician names, sorted. */
    listCanonical(): string[];
}
