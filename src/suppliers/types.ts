import type { ManufacturerPart, Part, SupplierPart } from "../inventree/types.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export type ApiPartFields = {
  description: string;
  imageUrl: string;
  datasheetUrl: string;
  supplierLink: string;
  sku: string;
  manufacturer: string;
  manufacturerLink: string;
  mpn: string;
  quantityAvailable: number;
  packaging: string;
  categoryPath: string[];
  parameters: Map<string, string>;
  priceBreaks: Map<number, number>;
  currency: string;
};

/** Loads the fields a search response leaves empty; null means the lookup failed. */
export type ApiPartFinalizer = (part: ApiPart) => Promise<Partial<ApiPartFields> | null>;

/**
 * One supplier listing, normalized. Some fields are only filled in by `finalize`,
 * which runs its lookup at most once no matter how often it is awaited.
 */
export class ApiPart implements ApiPartFields {
  description: string;
  imageUrl: string;
  datasheetUrl: string;
  supplierLink: string;
  sku: string;
  manufacturer: string;
  manufacturerLink: string;
  mpn: string;
  quantityAvailable: number;
  packaging: string;
  categoryPath: string[];
  parameters: Map<string, string>;
  priceBreaks: Map<number, number>;
  currency: string;

  private readonly finalizer?: ApiPartFinalizer;
  private finalizing: Promise<boolean> | null = null;

  constructor(fields: ApiPartFields, finalizer?: ApiPartFinalizer) {
    this.description = fields.description;
    this.imageUrl = fields.imageUrl;
    this.datasheetUrl = fields.datasheetUrl;
    this.supplierLink = fields.supplierLink;
    this.sku = fields.sku;
    this.manufacturer = fields.manufacturer;
    this.manufacturerLink = fields.manufacturerLink;
    this.mpn = fields.mpn;
    this.quantityAvailable = fields.quantityAvailable;
    this.packaging = fields.packaging;
    this.categoryPath = fields.categoryPath;
    this.parameters = fields.parameters;
    this.priceBreaks = fields.priceBreaks;
    this.currency = fields.currency;
    this.finalizer = finalizer;
  }

  finalize(): Promise<boolean> {
    if (!this.finalizing) {
      this.finalizing = this.runFinalizer();
    }
    return this.finalizing;
  }

  getPartData(): Pick<Part, "name" | "description" | "link" | "component" | "purchaseable"> {
    return {
      name: this.mpn,
      description: this.description,
      link: this.manufacturerLink.slice(0, 200),
      component: true,
      purchaseable: true
    };
  }

  getManufacturerPartData(): Pick<ManufacturerPart, "MPN" | "description" | "link"> {
    return {
      MPN: this.mpn,
      description: this.description,
      link: this.manufacturerLink.slice(0, 200)
    };
  }

  getSupplierPartData(): Pick<SupplierPart, "description" | "link" | "packaging" | "available"> {
    return {
      description: this.description,
      link: this.supplierLink.slice(0, 200),
      packaging: this.packaging,
      available: this.quantityAvailable
    };
  }

  private async runFinalizer(): Promise<boolean> {
    if (!this.finalizer) {
      return true;
    }
    let fields: Partial<ApiPartFields> | null;
    try {
      fields = await this.finalizer(this);
    } catch (error) {
      logger.warn({ msg: "Failed to load supplier part details", sku: this.sku, error: errorMessage(error) });
      return false;
    }
    if (!fields) {
      return false;
    }
    Object.assign(this, fields);
    return true;
  }
}

export type SupplierSearchResult = {
  parts: ApiPart[];
  total: number;
};

export interface Supplier {
  readonly id: string;
  readonly name: string;
  search(term: string): Promise<SupplierSearchResult>;
}
