export function partUrl(baseUrl: string, partPk: number): string {
  return `${baseUrl}/part/${partPk}/`;
}

export function supplierPartUrl(baseUrl: string, supplierPartPk: number): string {
  return `${baseUrl}/supplier-part/${supplierPartPk}/`;
}
