// src/core/common/entities/supplier-column-mapping.entity.ts
import {
    Column,
    CreateDateColumn,
    Entity,
    PrimaryColumn,
    UpdateDateColumn
} from 'typeorm';

@Entity('supplier_column_mappings') // Table name
export class SupplierColumnMapping {

    // Sanitised supplier id, see sanitizeSupplierId
    @PrimaryColumn({ type: 'nvarchar', length: 128 })
    supplierId!: string;

    // JSON object: canonical field -> supplier column
    @Column({ type: 'nvarchar', length: 'MAX' })
    mappingJson!: string;

    @CreateDateColumn({ type: 'datetime2' })
    createdAt!: Date;

    @UpdateDateColumn({ type: 'datetime2' })
    updatedAt!: Date;
}
