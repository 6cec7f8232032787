// Vitest setup file
// This runs before every test file

// Keep credentials from a developer's shell out of the tests
delete process.env.GOOGLE_API_KEY;
delete process.env.GEMINI_API_KEY;
delete process.env.API_URL;
