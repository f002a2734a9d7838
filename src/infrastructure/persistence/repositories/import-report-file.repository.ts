// src/infrastructure/persistence/repositories/import-report-file.repository.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import winston from 'winston';

import { StorageConfig } from '../../../config';
import { ImportReport } from '../../../core/common/interfaces/models';
import { IImportReportRepository } from '../../../core/common/interfaces/repositories';
import { isPlainObject, parseMonth } from '../../../core/common/utils';
import { LOGGER_TOKEN } from '../../logger';
import { readJsonFile, writeJsonFileAtomic } from '../json-file.utils';
import { STORAGE_CONFIG_TOKEN } from '../tokens';

function isImportReport(value: unknown): value is ImportReport {
    return isPlainObject(value)
        && typeof value.batchId === 'string'
        && typeof value.createdAt === 'string'
        && typeof value.year === 'string'
        && parseMonth(value.month) !== null
        && Array.isArray(value.files)
        && isPlainObject(value.unknownTechnicianMinutes)
        && isPlainObject(value.ignoredMinutesByCompany)
        && Array.isArray(value.failedFiles);
}

@injectable()
export class ImportReportFileRepository implements IImportReportRepository {
    private readonly filePath: string;

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(STORAGE_CONFIG_TOKEN) storage: StorageConfig
    ) {
        this.filePath = storage.importReportFile;
    }

    save(report: ImportReport): void {
        writeJsonFileAtomic(this.filePath, report);
        this.logger.info(`Import report ${report.batchId} written to ${this.filePath}`);
    }

    findLatest(): ImportReport | null {
        const result = readJsonFile(this.filePath);
        if (result.status === 'missing') return null;
        if (result.status === 'unreadable') {
            this.logger.warn(`Import report at ${this.filePath} is unreadable: ${result.reason}`);
            return null;
        }
        if (!isImportReport(result.document)) {
            this.logger.warn(`Import report at ${this.filePath} has an unexpected shape.`);
            return null;
        }
        return result.document;
    }
}
