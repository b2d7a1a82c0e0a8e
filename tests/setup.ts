process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "error";
process.env.DOCUMENT_URL_BASE = "https://documents.example.test/files";
process.env.DOCUMENT_URL_SIGNING_SECRET = "test-secret";
process.env.STRIPE_SECRET_KEY = "test-stripe-key";
process.env.STRIPE_WEBHOOK_SECRET = "test-webhook-secret";
process.env.LICENSE_EXPIRY_WARNING_DAYS = "14";
