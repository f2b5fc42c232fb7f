//src/register.ts

import { container } from "tsyringe";
import config from "./config";
import { SupplierColumnMapping } from "./core/common/entities";
import { MAPPING_STORE_TOKEN } from "./core/common/interfaces/repositories";
import {
    ColumnMapperService, FIELD_VOCABULARY_TOKEN, loadFieldVocabulary, loadStaticMappings,
    MappingResolverService, STATIC_MAPPINGS_TOKEN
} from "./core/mapping";
import { RecordMatcherService } from "./core/matching";
import { OfferGeneratorService } from "./core/offers";
import { FileParserService } from "./core/parsing";
import { ReconciliationService } from "./core/reconciliation";
import { ReportGeneratorService } from "./core/reporting";
import { PriceListSessionService } from "./core/sessions";
import { AppDataSource } from "./infrastructure/database/providers/data-source.provider";
import {
    DatabaseMappingStore, SUPPLIER_MAPPING_ORM_REPOSITORY_TOKEN
} from "./infrastructure/database/repositories/supplier-mapping.repository";
import loggerInstance, { LOGGER_TOKEN } from "./infrastructure/logger";
import { FileMappingStore, MAPPING_DIRECTORY_TOKEN } from "./infrastructure/persistence/file-mapping.store";
import { PriceListController } from "./infrastructure/webserver/controllers/price-list.controller";


export function registerDependencies(): void {
    // IMPORTANT: Register Logger FIRST
    container.register(LOGGER_TOKEN, {
        useValue: loggerInstance
    });
    loggerInstance.debug("Registered: LOGGER_TOKEN");

    // Configuration files loaded once at start-up
    const vocabulary = loadFieldVocabulary(config.mapping.vocabularyFile);
    container.register(FIELD_VOCABULARY_TOKEN, { useValue: vocabulary });
    container.register(STATIC_MAPPINGS_TOKEN, {
        useValue: loadStaticMappings(config.mapping.staticMappingsFile, vocabulary)
    });
    loggerInstance.debug(`Registered: field vocabulary (${config.mapping.vocabularyFile}) and static supplier mappings`);

    // Register Infrastructure Providers/Repositories
    container.registerSingleton(AppDataSource);

    if (config.mapping.store === 'database') {
        // Resolved lazily: AppDataSource.init() must have completed first
        container.register(SUPPLIER_MAPPING_ORM_REPOSITORY_TOKEN, {
            useFactory: c => c.resolve(AppDataSource).getDataSource().getRepository(SupplierColumnMapping)
        });
        container.register(MAPPING_STORE_TOKEN, { useFactory: c => c.resolve(DatabaseMappingStore) });
    } else {
        container.register(MAPPING_DIRECTORY_TOKEN, { useValue: config.mapping.directory });
        container.register(MAPPING_STORE_TOKEN, { useFactory: c => c.resolve(FileMappingStore) });
    }
    loggerInstance.debug(`Registered: MAPPING_STORE_TOKEN (${config.mapping.store})`);

    // Register Core Services
    container.registerSingleton(FileParserService);
    container.registerSingleton(ColumnMapperService);
    container.registerSingleton(MappingResolverService);
    container.registerSingleton(RecordMatcherService);
    container.registerSingleton(ReconciliationService);
    container.registerSingleton(OfferGeneratorService);
    container.registerSingleton(ReportGeneratorService);
    container.registerSingleton(PriceListSessionService);
    loggerInstance.debug("Registered: core services (Singleton)");

    // Register Controllers
    container.registerSingleton(PriceListController);
    loggerInstance.debug("Registered: PriceListController (Singleton)");
}
