import swaggerJsdoc from "swagger-jsdoc";

import { API_VERSION } from "../shared/constants.js";

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: "3.0.0",
    info: {
      title: "Contacts API",
      version: API_VERSION,
      description: "REST API for a personal contacts book with email-verified accounts",
    },
    servers: [
      {
        url: "http://localhost:3000",
        description: "Development server",
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: "http",
          scheme: "bearer",
          bearerFormat: "JWT",
        },
      },
    },
    tags: [
      { name: "Health", description: "Health check endpoints" },
      { name: "Auth", description: "Signup, login, tokens, email confirmation and password reset" },
      { name: "Users", description: "Current user profile and avatar" },
      { name: "Contacts", description: "Contacts CRUD, search and upcoming birthdays" },
    ],
  },
  apis: ["./src/app.ts", "./src/modules/**/*.routes.ts"],
};

export const swaggerSpec = swaggerJsdoc(options);
