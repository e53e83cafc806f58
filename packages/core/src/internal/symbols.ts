export const assetSymbol = Symbol.for("switchyard.asset");
export const bodyConverterSymbol = Symbol.for("switchyard.body-converter");
export const routeDefinitionSymbol = Symbol.for("switchyard.route-definition");
