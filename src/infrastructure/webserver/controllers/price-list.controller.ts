// src/infrastructure/webserver/controllers/price-list.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { ValidationError } from '../../../core/common/errors';
import { RawTable } from '../../../core/common/interfaces/models';
import { FileParserService, IFileParserService } from '../../../core/parsing';
import { ApplySupplierOptions, IPriceListSessionService, PriceListSessionService } from '../../../core/sessions';
import { LOGGER_TOKEN } from '../../logger';
import {
    exportQuerySchema, offersSchema, openSessionSchema, parseRequest,
    SupplierRequestInput, supplierRequestSchema, tableSelectionSchema, toMappingRequest
} from '../validation/request.schemas';

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

@singleton()
@injectable()
export class PriceListController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(FileParserService) private fileParser: IFileParserService,
        @inject(PriceListSessionService) private sessions: IPriceListSessionService
    ) {
        this.logger.info('PriceListController initialized.');
    }

    /** POST /mapping : columns and suggested internal mapping of a price list, to confirm before opening */
    public handleDescribePriceList = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const file = this.requireFile(req.file, 'priceList');
            const input = parseRequest(tableSelectionSchema, req.body);
            const table = await this.fileParser.parseTable(file.buffer, file.originalname, input);

            res.status(200).json({
                fileName: file.originalname,
                sheets: this.fileParser.listSheets(file.buffer, file.originalname),
                ...this.sessions.describePriceList(table),
            });
        } catch (error) {
            next(error);
        }
    };

    /** GET /mappings : supplier ids with a saved mapping */
    public handleListSavedMappings = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            res.status(200).json({ suppliers: await this.sessions.listSavedMappings() });
        } catch (error) {
            next(error);
        }
    };

    /** POST / : upload the company price list and open a session */
    public handleOpenSession = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const file = this.requireFile(req.file, 'priceList');
            const input = parseRequest(openSessionSchema, req.body);
            this.logger.info(`Opening session from "${file.originalname}" (${(file.size / 1024).toFixed(2)} KB)`);

            const table = await this.fileParser.parseTable(file.buffer, file.originalname, input);
            const session = this.sessions.openSession(table, {
                sourceFile: file.originalname,
                internalMapping: input.internalMapping,
            });
            res.status(201).json(session);
        } catch (error) {
            next(error);
        }
    };

    /** GET /:id */
    public handleGetSession = (req: Request, res: Response, next: NextFunction): void => {
        try {
            res.status(200).json(this.sessions.getSession(req.params.id));
        } catch (error) {
            next(error);
        }
    };

    /** DELETE /:id */
    public handleCloseSession = (req: Request, res: Response, next: NextFunction): void => {
        try {
            this.sessions.closeSession(req.params.id);
            res.status(204).end();
        } catch (error) {
            next(error);
        }
    };

    /** POST /:id/suppliers/mapping : columns, suggested/saved/static mappings and raw preview rows */
    public handleDescribeSupplier = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const file = this.requireFile(req.file, 'supplierList');
            const input = parseRequest(supplierRequestSchema, req.body);
            const table = await this.fileParser.parseTable(file.buffer, file.originalname, input);
            const description = await this.sessions.describeSupplierTable(req.params.id, table, input.supplierId);

            res.status(200).json({
                fileName: file.originalname,
                sheets: this.fileParser.listSheets(file.buffer, file.originalname),
                previewRows: this.fileParser.previewRows(file.buffer, file.originalname, { sheetName: input.sheetName }),
                ...description,
            });
        } catch (error) {
            next(error);
        }
    };

    /** POST /:id/suppliers/preview : updates and inserts without touching the price list */
    public handlePreviewSupplier = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { table, input } = await this.readSupplierUpload(req);
            const preview = await this.sessions.previewSupplier(
                req.params.id, table, toMappingRequest(input), this.toApplyOptions(input)
            );
            res.status(200).json({
                summary: preview.report.summary,
                warnings: preview.report.warnings,
                outcomes: preview.report.outcomes,
                updates: preview.updates,
                inserts: preview.inserts,
            });
        } catch (error) {
            next(error);
        }
    };

    /** POST /:id/suppliers : apply one supplier list */
    public handleApplySupplier = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { table, input, fileName } = await this.readSupplierUpload(req);
            const options = { ...this.toApplyOptions(input), label: input.label ?? fileName };
            const report = await this.sessions.applySupplier(req.params.id, table, toMappingRequest(input), options);
            res.status(200).json(report);
        } catch (error) {
            next(error);
        }
    };

    /** POST /:id/suppliers/batch : apply several supplier lists in upload order */
    public handleApplySupplierBatch = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const files = Array.isArray(req.files) ? req.files : [];
            if (files.length === 0) {
                throw new ValidationError('At least one supplier file ("supplierLists") is required.');
            }
            const input = parseRequest(supplierRequestSchema, req.body);
            this.logger.info(`Received ${files.length} supplier file(s) for session ${req.params.id}.`);

            const results = await this.sessions.applySupplierBatch(
                req.params.id,
                files.map(f => ({ buffer: f.buffer, fileName: f.originalname })),
                toMappingRequest(input),
                this.toApplyOptions(input),
                { sheetName: input.sheetName, headerRow: input.headerRow }
            );
            res.status(200).json({ results });
        } catch (error) {
            next(error);
        }
    };

    /** POST /:id/offers */
    public handleGenerateOffers = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const input = parseRequest(offersSchema, req.body);
            const offers = await this.sessions.generateOffers(req.params.id, input);
            res.status(200).json({ count: offers.length, offers });
        } catch (error) {
            next(error);
        }
    };

    /** GET /:id/export : xlsx download */
    public handleExport = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { includeOffers, ...offerOptions } = parseRequest(exportQuerySchema, req.query);
            const buffer = await this.sessions.exportWorkbook(req.params.id, { includeOffers, offerOptions });

            const filename = `listino_aggiornato_${new Date().toISOString().slice(0, 10)}.xlsx`;
            res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
            res.setHeader('Content-Type', XLSX_MIME);
            res.send(buffer);
        } catch (error) {
            next(error);
        }
    };

    // --- Helper Methods ---

    private requireFile(file: Express.Multer.File | undefined, field: string): Express.Multer.File {
        if (!file) {
            throw new ValidationError(`A file in the "${field}" field is required.`);
        }
        return file;
    }

    private async readSupplierUpload(req: Request): Promise<{ table: RawTable; input: SupplierRequestInput; fileName: string }> {
        const file = this.requireFile(req.file, 'supplierList');
        const input = parseRequest(supplierRequestSchema, req.body);
        const table = await this.fileParser.parseTable(file.buffer, file.originalname, input);
        return { table, input, fileName: file.originalname };
    }

    private toApplyOptions(input: SupplierRequestInput): ApplySupplierOptions {
        return {
            keys: input.keys,
            inputFields: input.inputFields,
            ambiguityPolicy: input.ambiguityPolicy,
            selectedRows: input.selectedRows,
            label: input.label,
        };
    }
}
