import fs from 'fs';
import path from 'path';
import { swaggerSpec } from '../src/swagger/swagger.config';

/**
 * Write the OpenAPI document to dist/openapi.json for clients and gateways
 */
const outputPath = path.join(__dirname, '../dist/openapi.json');

fs.mkdirSync(path.dirname(outputPath), { recursive: true });
fs.writeFileSync(outputPath, JSON.stringify(swaggerSpec, null, 2));

const paths = 'paths' in swaggerSpec && typeof swaggerSpec.paths === 'object' && swaggerSpec.paths !== null
  ? Object.keys(swaggerSpec.paths).length
  : 0;

console.log(`✅ OpenAPI document generated: ${outputPath}`);
console.log(`   Paths found: ${paths}`);
