// Loaded before every test file, ahead of any src/ import
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
