export type Company = {
  pk: number;
  name: string;
  description?: string;
  website?: string;
  is_manufacturer: boolean;
  is_supplier: boolean;
};

export type PartCategory = {
  pk: number;
  name: string;
  pathstring: string;
  parent: number | null;
  description?: string;
  structural?: boolean;
};

export type Part = {
  pk: number;
  name: string;
  description: string;
  category: number | null;
  link?: string;
  image?: string | null;
  purchaseable?: boolean;
  component?: boolean;
};

export type ManufacturerPart = {
  pk: number;
  part: number;
  manufacturer: number;
  MPN: string;
  description?: string;
  link?: string;
};

export type SupplierPart = {
  pk: number;
  part: number;
  supplier: number;
  manufacturer_part: number | null;
  SKU: string;
  description?: string;
  link?: string;
  packaging?: string;
  available?: number;
};

export type PriceBreak = {
  pk: number;
  part: number;
  quantity: number;
  // the server serializes decimals as strings
  price: number | string;
  price_currency?: string;
};

export type ParameterTemplate = {
  pk: number;
  name: string;
  units?: string;
  description?: string;
};

export type Parameter = {
  pk: number;
  part: number;
  template: number;
  data: string;
  template_detail?: { name: string };
};

export type Attachment = {
  pk: number;
  comment: string;
  link?: string | null;
  attachment?: string | null;
};

export type StockItem = {
  pk: number;
  part: number;
  location: number;
  quantity: number;
};

export type Patch<T extends { pk: number }> = Partial<Omit<T, "pk">>;
export type NewEntity<T extends { pk: number }> = Omit<T, "pk">;

/**
 * Everything the importer needs from the inventory server. Lookups return null when
 * nothing matches; every write resolves to the stored entity.
 */
export interface PartRepository {
  readonly baseUrl: string;

  findCompany(name: string, role: "manufacturer" | "supplier"): Promise<Company | null>;
  createCompany(data: NewEntity<Company>): Promise<Company>;

  getPart(pk: number): Promise<Part>;
  findPartByName(name: string): Promise<Part | null>;
  createPart(data: NewEntity<Part>): Promise<Part>;
  updatePart(pk: number, patch: Patch<Part>): Promise<Part>;
  /** Resolves to the updated part, or null when the image could not be fetched. */
  uploadPartImage(pk: number, imageUrl: string): Promise<Part | null>;

  listAttachments(partPk: number): Promise<Attachment[]>;
  addLinkAttachment(partPk: number, link: string, comment: string): Promise<Attachment>;
  uploadAttachment(partPk: number, fileUrl: string, comment: string): Promise<Attachment>;

  getManufacturerPart(pk: number): Promise<ManufacturerPart>;
  findManufacturerPartByMpn(mpn: string): Promise<ManufacturerPart | null>;
  createManufacturerPart(data: NewEntity<ManufacturerPart>): Promise<ManufacturerPart>;
  updateManufacturerPart(pk: number, patch: Patch<ManufacturerPart>): Promise<ManufacturerPart>;

  findSupplierPartBySku(sku: string): Promise<SupplierPart | null>;
  createSupplierPart(data: NewEntity<SupplierPart>): Promise<SupplierPart>;
  updateSupplierPart(pk: number, patch: Patch<SupplierPart>): Promise<SupplierPart>;

  listPriceBreaks(supplierPartPk: number): Promise<PriceBreak[]>;
  createPriceBreak(data: NewEntity<PriceBreak>): Promise<PriceBreak>;
  updatePriceBreak(pk: number, patch: Patch<PriceBreak>): Promise<PriceBreak>;

  listParameters(partPk: number): Promise<Parameter[]>;
  createParameter(data: NewEntity<Parameter>): Promise<Parameter>;
  updateParameter(pk: number, patch: Patch<Parameter>): Promise<Parameter>;

  listParameterTemplates(): Promise<ParameterTemplate[]>;
  createParameterTemplate(data: NewEntity<ParameterTemplate>): Promise<ParameterTemplate>;

  listCategories(): Promise<PartCategory[]>;
  createCategory(data: Omit<NewEntity<PartCategory>, "pathstring">): Promise<PartCategory>;

  createStockItem(data: NewEntity<StockItem>): Promise<StockItem>;
}
