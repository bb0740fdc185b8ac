export const buildPublicKeyScript = (variableName: string, publicKey: string) =>
  `var ${variableName} = ${JSON.stringify(publicKey)};`;
