// src/infrastructure/persistence/repositories/ledger-file.repository.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import winston from 'winston';

import { StorageConfig } from '../../../config';
import { Ledger } from '../../../core/common/interfaces/models';
import { ILedgerRepository, LedgerFileReadResult } from '../../../core/common/interfaces/repositories';
import { formatFileTimestamp } from '../../../core/common/utils';
import { LOGGER_TOKEN } from '../../logger';
import { copyFileIfExists, readJsonFile, writeJsonFileAtomic } from '../json-file.utils';
import { STORAGE_CONFIG_TOKEN } from '../tokens';

@injectable()
export class LedgerFileRepository implements ILedgerRepository {
    public readonly location: string;

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(STORAGE_CONFIG_TOKEN) storage: StorageConfig
    ) {
        this.location = storage.ledgerFile;
        this.logger.info(`LedgerFileRepository using ${this.location}`);
    }

    read(): LedgerFileReadResult {
        return readJsonFile(this.location);
    }

    write(ledger: Ledger): void {
        writeJsonFileAtomic(this.location, ledger);
        this.logger.debug(`Ledger written to ${this.location}`);
    }

    backup(): string | null {
        const target = copyFileIfExists(this.location, `${this.location}.bak.${formatFileTimestamp()}`);
        if (!target) {
            return null;
        }
        this.logger.info(`Ledger backup created: ${target}`);
        return target;
    }
}
