// src/infrastructure/webserver/middleware/upload.middleware.ts
import { Request } from 'express';
import multer from 'multer';
import path from 'path';
import config from '../../../config';
import { UnsupportedFormatError } from '../../../core/common/errors';

// Configure multer for memory storage (files are parsed then discarded)
const storage = multer.memoryStorage();

export const ALLOWED_EXTENSIONS = ['.xlsx', '.xls', '.xlsm', '.csv', '.txt'];

// Browsers disagree on spreadsheet/CSV mime types, so the extension decides
export const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
    const extension = path.extname(file.originalname).toLowerCase();
    if (ALLOWED_EXTENSIONS.includes(extension)) {
        cb(null, true);
    } else {
        cb(new UnsupportedFormatError(
            `Invalid file type: ${file.originalname}. Only Excel (${ALLOWED_EXTENSIONS.slice(0, 3).join(', ')}) and CSV/TXT files are allowed.`
        ));
    }
};

// Configure multer instance
const upload = multer({
    storage: storage,
    fileFilter: fileFilter,
    limits: {
        fileSize: config.upload.maxFileSizeMb * 1024 * 1024,
    }
});

/** The company price list: field 'priceList'. */
export const uploadPriceList = upload.single('priceList');

/** One supplier price list: field 'supplierList'. */
export const uploadSupplierList = upload.single('supplierList');

/** Several supplier price lists applied in upload order: field 'supplierLists'. */
export const uploadSupplierLists = upload.array('supplierLists', 20);
