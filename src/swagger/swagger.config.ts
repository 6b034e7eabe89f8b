import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Lab Equipment Desk API',
      version: '1.0.0',
      description: `
Borrow and return tracking for a university laboratory equipment room.

## Features
- Equipment catalog with live availability
- Badge (RFID) based issuing, authorized by an instructor badge
- Partial returns credited first-in-first-out across open borrows
- Optional staging of kiosk returns for staff approval
- Borrower's and return slips as PDF, mailed to the borrower
- Usage reports

## Inventory Ledger
For every item: \`0 ≤ borrowed_quantity ≤ total_quantity\`, and
\`borrowed_quantity\` equals the sum of outstanding quantities of its open
transactions after every committed operation.

This is enforced through:
- Row locks on items for the duration of each issue or return
- Guarded updates that roll back a return if a balance changed underneath it
- Database check constraints as fallback protection

## Return policy
Over-returns are ${env.OVER_RETURN_POLICY === 'reject' ? 'rejected with 409 OVER_RETURN' : 'truncated to the outstanding quantity and reported in the receipt'}.
      `.trim(),
      contact: {
        name: 'Equipment Room',
      },
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Auth', description: 'Staff sign-in and accounts' },
      { name: 'Items', description: 'Equipment catalog' },
      { name: 'Borrowers', description: 'Students, instructors and staff with badges' },
      { name: 'Borrows', description: 'Issuing equipment' },
      { name: 'Returns', description: 'Desk and kiosk returns' },
      { name: 'Pending Returns', description: 'Kiosk returns awaiting staff approval' },
      { name: 'Transactions', description: 'Borrowing history and slips' },
      { name: 'Reports', description: 'Usage reporting' },
      { name: 'System', description: 'Health' },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        Item: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            name: { type: 'string' },
            category: { type: 'string', nullable: true },
            totalQuantity: { type: 'integer', minimum: 0 },
            borrowedQuantity: { type: 'integer', minimum: 0 },
            availableQuantity: { type: 'integer', minimum: 0 },
            availabilityStatus: { type: 'string', enum: ['Available', 'Unavailable'] },
            archivedAt: { type: 'string', format: 'date-time', nullable: true },
          },
        },
        BorrowTransaction: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            referenceNumber: { type: 'string', example: '0000042' },
            borrowerId: { type: 'integer' },
            itemId: { type: 'integer' },
            itemName: { type: 'string', nullable: true },
            borrowedQty: { type: 'integer', minimum: 1 },
            returnedQty: { type: 'integer', minimum: 0 },
            outstandingQty: { type: 'integer', minimum: 0 },
            status: { type: 'string', enum: ['borrowed', 'partial', 'returned'] },
            borrowedAt: { type: 'string', format: 'date-time' },
            returnedAt: { type: 'string', format: 'date-time', nullable: true },
          },
        },
        ReturnReceipt: {
          type: 'object',
          properties: {
            referenceNumber: { type: 'string' },
            borrowerId: { type: 'integer' },
            borrowerName: { type: 'string' },
            items: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  itemName: { type: 'string' },
                  quantity: { type: 'integer' },
                  condition: { type: 'string', nullable: true },
                },
              },
            },
            skipped: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  index: { type: 'integer' },
                  itemName: { type: 'string' },
                  reason: { type: 'string' },
                },
              },
            },
            truncated: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  itemName: { type: 'string' },
                  claimed: { type: 'integer' },
                  credited: { type: 'integer' },
                },
              },
            },
            transactionIds: { type: 'array', items: { type: 'integer' } },
            returnedAt: { type: 'string', format: 'date-time' },
            processedBy: { type: 'string' },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: {
                  type: 'string',
                  description: 'Error code',
                },
                message: {
                  type: 'string',
                  description: 'Human-readable error message',
                },
                details: {
                  type: 'object',
                  description: 'Additional error details',
                },
              },
            },
          },
        },
      },
    },
  },
  apis: ['./src/routes/**/*.ts'], // Path to route files with JSDoc comments
};

export const swaggerSpec = swaggerJsdoc(options);
