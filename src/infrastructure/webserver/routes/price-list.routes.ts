// src/infrastructure/webserver/routes/price-list.routes.ts
import { Router } from 'express';
import { container } from 'tsyringe';
import { PriceListController } from '../controllers/price-list.controller';
import { uploadPriceList, uploadSupplierList, uploadSupplierLists } from '../middleware/upload.middleware';

/**
 * Builds the /api/price-lists router. The controller is resolved from the
 * DI container when the router is created, after registration.
 */
export function createPriceListRouter(): Router {
    const router = Router();
    const controller = container.resolve(PriceListController);

    // POST /api/price-lists - Upload the company price list ('priceList') and open a session
    router.post('/', uploadPriceList, controller.handleOpenSession);

    // Suggested column mapping of a price list ('priceList'), to confirm before opening
    router.post('/mapping', uploadPriceList, controller.handleDescribePriceList);

    // Registered before '/:id'
    router.get('/mappings', controller.handleListSavedMappings);

    router.get('/:id', controller.handleGetSession);
    router.delete('/:id', controller.handleCloseSession);

    // Supplier lists ('supplierList'): suggest a mapping, preview, apply
    router.post('/:id/suppliers/mapping', uploadSupplierList, controller.handleDescribeSupplier);
    router.post('/:id/suppliers/preview', uploadSupplierList, controller.handlePreviewSupplier);
    router.post('/:id/suppliers', uploadSupplierList, controller.handleApplySupplier);

    // Several supplier lists ('supplierLists'), applied in upload order
    router.post('/:id/suppliers/batch', uploadSupplierLists, controller.handleApplySupplierBatch);

    router.post('/:id/offers', controller.handleGenerateOffers);

    // GET /api/price-lists/:id/export?includeOffers=true - Download the workbook
    router.get('/:id/export', controller.handleExport);

    return router;
}
