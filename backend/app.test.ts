import path from 'path';
import request from 'supertest';
import { createApp } from './app';
import { UPLOAD_CONFIG } from './config/model';
import { ImagePreprocessor } from './services/prediction/ImagePreprocessor';
import { ModelLoader } from './services/prediction/ModelLoader';
import { ModelRegistry } from './services/prediction/ModelRegistry';
import { PredictionPipeline } from './services/prediction/PredictionPipeline';
import { fakeFirebaseAuth } from './test/fakeFirebaseAuth';
import { createTestModelConfig, FakeModelRuntime, greyscalePng } from './test/fakeModelRuntime';

jest.mock('./config/firebase', () => {
  const { fakeFirebaseAuth: auth } = jest.requireActual<typeof import('./test/fakeFirebaseAuth')>('./test/fakeFirebaseAuth');
  return {
    isFirebaseAvailable: () => true,
    getUserRole: (email: string) => (email === 'admin@example.com' ? 'admin' : 'user'),
    getFirebaseAuth: () => auth
  };
});

const buildApp = async (createModelFile = true) => {
  const registry = new ModelRegistry(new ModelLoader(new FakeModelRuntime(), createTestModelConfig(createModelFile)));
  await registry.initialize();
  const pipeline = new PredictionPipeline(registry, {
    constraints: (contentType) => ({ ...ImagePreprocessor.defaultConstraints(contentType), inputSize: 8 })
  });
  const app = createApp({
    registry,
    pipeline,
    uploadConfig: { ...UPLOAD_CONFIG, maxFileSizeBytes: 4096 },
    corsOrigins: ['http://localhost:3000'],
    apiSpecPath: path.join(__dirname, 'api-spec.json')
  });
  return { app, registry };
};

const validResults = {
  full_name: 'Normal Brain Scan',
  description: 'The brain scan appears normal with no signs of neurological disorders.',
  recommendation: 'Continue regular health monitoring.',
  primary_confidence: 85,
  confidence: { control: 85, alzheimer: 10, parkinson: 5 }
};

describe('Brain scan API', () => {
  let scan: Buffer;

  beforeAll(async () => {
    scan = await greyscalePng(32, 32, 100);
  });

  beforeEach(() => {
    fakeFirebaseAuth.reset();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('service endpoints', () => {
    it('GET /health reports liveness', async () => {
      const { app } = await buildApp();

      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('OK');
    });

    it('GET /api/health is healthy when the model is loaded', async () => {
      const { app } = await buildApp();

      const res = await request(app).get('/api/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual(expect.objectContaining({
        status: 'healthy',
        ai_model: 'loaded',
        model_kind: 'real',
        auth: 'available'
      }));
    });

    it('GET /api/health is unhealthy without a model', async () => {
      const { app } = await buildApp(false);

      const res = await request(app).get('/api/health');

      expect(res.status).toBe(503);
      expect(res.body.ai_model).toBe('not_loaded');
    });

    it('GET /api/predictions/test lists the prediction routes', async () => {
      const { app } = await buildApp();

      const res = await request(app).get('/api/predictions/test');

      expect(res.status).toBe(200);
      expect(res.body.endpoints).toContainEqual({ path: '/test', method: 'GET', auth: 'none' });
      expect(res.body.endpoints).toContainEqual({ path: '/reload-model', method: 'POST', auth: 'admin' });
      expect(res.body.endpoints).toHaveLength(6);
    });

    it('answers 400 for a malformed JSON body', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/generate-report')
        .set('Authorization', 'Bearer user-token')
        .set('Content-Type', 'application/json')
        .send('{"results": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Invalid JSON', message: 'Request body must contain valid JSON data' });
    });

    it('answers 404 for unknown routes', async () => {
      const { app } = await buildApp();

      const res = await request(app).get('/api/unknown');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Route not found' });
    });
  });

  describe('POST /api/predictions/predict', () => {
    it('requires a bearer token', async () => {
      const { app } = await buildApp();

      const res = await request(app).post('/api/predictions/predict').attach('image', scan, 'scan.png');

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('Authorization required');
    });

    it('rejects an invalid token', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/predict')
        .set('Authorization', 'Bearer forged-token')
        .attach('image', scan, 'scan.png');

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('Invalid token');
    });

    it('returns a diagnosis for an uploaded scan', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/predict')
        .set('Authorization', 'Bearer user-token')
        .attach('image', scan, 'scan.png');

      expect(res.status).toBe(200);
      expect(res.body.success).toBe(true);
      expect(res.body.prediction).toEqual(expect.objectContaining({
        name: 'CONTROL',
        confidence: { control: 85, alzheimer: 10, parkinson: 5 },
        primary_confidence: 85
      }));
      expect(res.body.metadata).toEqual(expect.objectContaining({
        filename: 'scan.png',
        file_size_bytes: scan.length,
        model_version: 'TestNet',
        model_kind: 'real',
        user_id: 'Dr Test'
      }));
    });

    it('requires an image field', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/predict')
        .set('Authorization', 'Bearer user-token')
        .field('note', 'no image attached');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('No file uploaded');
    });

    it('rejects unsupported file extensions', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/predict')
        .set('Authorization', 'Bearer user-token')
        .attach('image', scan, 'scan.bmp');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        error: 'Invalid file type',
        message: 'Allowed file types: png, jpg, jpeg, gif, tif, tiff, webp'
      });
    });

    it('reports uploads over the size limit as an invalid image', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/predict')
        .set('Authorization', 'Bearer user-token')
        .attach('image', Buffer.alloc(5000), 'large.png');

      expect(res.status).toBe(400);
      expect(res.body.success).toBe(false);
      expect(res.body.error).toBe('Invalid image');
    });

    it('answers 503 when no model is loaded', async () => {
      const { app } = await buildApp(false);

      const res = await request(app)
        .post('/api/predictions/predict')
        .set('Authorization', 'Bearer user-token')
        .attach('image', scan, 'scan.png');

      expect(res.status).toBe(503);
      expect(res.body.success).toBe(false);
      expect(res.body.error).toBe('Model not available');
    });
  });

  describe('model lifecycle', () => {
    it('GET /api/predictions/model-status describes the handle', async () => {
      const { app } = await buildApp();

      const res = await request(app).get('/api/predictions/model-status');

      expect(res.status).toBe(200);
      expect(res.body.loaded).toBe(true);
      expect(res.body.detail).toEqual(expect.objectContaining({
        state: 'loaded',
        kind: 'real',
        version: 'TestNet',
        runtime: 'fake-runtime',
        inputShape: [1, 8, 8, 3],
        labels: ['CONTROL', 'AD', 'PD']
      }));
    });

    it('GET /api/predictions/health mirrors the model state', async () => {
      const { app } = await buildApp(false);

      const res = await request(app).get('/api/predictions/health');

      expect(res.status).toBe(503);
      expect(res.body).toEqual(expect.objectContaining({
        status: 'unhealthy',
        service: 'prediction_service',
        model_loaded: false
      }));
    });

    it('POST /api/predictions/reload-model is admin only', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/reload-model')
        .set('Authorization', 'Bearer user-token')
        .send({});

      expect(res.status).toBe(403);
      expect(res.body.error).toBe('Forbidden');
    });

    it('reloads into a placeholder that predictions then report', async () => {
      const { app } = await buildApp(false);

      const reload = await request(app)
        .post('/api/predictions/reload-model')
        .set('Authorization', 'Bearer admin-token')
        .send({ placeholder: true });

      expect(reload.status).toBe(200);
      expect(reload.body).toEqual({
        success: true,
        state: 'loaded',
        kind: 'placeholder',
        version: 'placeholder',
        lastError: null,
        errorCode: null
      });

      const res = await request(app)
        .post('/api/predictions/predict')
        .set('Authorization', 'Bearer user-token')
        .attach('image', scan, 'scan.png');

      expect(res.status).toBe(200);
      expect(res.body.metadata.model_kind).toBe('placeholder');
    });

    it('answers 503 when a reload fails', async () => {
      const { app } = await buildApp(false);

      const res = await request(app)
        .post('/api/predictions/reload-model')
        .set('Authorization', 'Bearer admin-token')
        .send({});

      expect(res.status).toBe(503);
      expect(res.body.success).toBe(false);
      expect(res.body.errorCode).toBe('MODEL_UNAVAILABLE');
    });
  });

  describe('POST /api/predictions/generate-report', () => {
    it('requires a body', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/generate-report')
        .set('Authorization', 'Bearer user-token')
        .send({});

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('No data provided');
    });

    it('requires well-formed results', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/generate-report')
        .set('Authorization', 'Bearer user-token')
        .send({ filename: 'report.pdf' });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Missing results');
    });

    it('returns a PDF attachment', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/predictions/generate-report')
        .set('Authorization', 'Bearer user-token')
        .send({ results: validResults, filename: 'my report' });

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('application/pdf');
      expect(res.headers['content-disposition']).toBe('attachment; filename="my_report.pdf"');
    });
  });

  describe('/api/users', () => {
    const registration = {
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'New.User@Example.com',
      password: 'testpass1',
      confirmPassword: 'testpass1',
      userType: 'researcher',
      agreeToTerms: true
    };

    it('GET /api/users/health reports the auth service', async () => {
      const { app } = await buildApp();

      const res = await request(app).get('/api/users/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual(expect.objectContaining({
        status: 'healthy',
        service: 'user_routes',
        auth: 'available'
      }));
    });

    it('registers a new account', async () => {
      const { app } = await buildApp();

      const res = await request(app).post('/api/users/register').send(registration);

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        message: 'User registered successfully',
        user: {
          uid: 'created-1',
          email: 'new.user@example.com',
          emailVerified: false,
          firstName: 'Ada',
          lastName: 'Lovelace',
          name: 'Ada Lovelace',
          userType: 'researcher',
          role: 'user',
          createdAt: 'Fri, 02 Jan 2026 03:04:05 GMT',
          lastLoginAt: null
        }
      });
      expect(fakeFirebaseAuth.passwords.get('created-1')).toBe('testpass1');
    });

    it('rejects an email that is already registered', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/users/register')
        .send({ ...registration, email: 'doctor@example.com' });

      expect(res.status).toBe(409);
      expect(res.body.error).toBe('Email already registered');
    });

    it('validates registration fields', async () => {
      const { app } = await buildApp();

      const badName = await request(app).post('/api/users/register').send({ ...registration, firstName: 'R2D2' });
      const mismatch = await request(app).post('/api/users/register').send({ ...registration, confirmPassword: 'other1234' });
      const noTerms = await request(app).post('/api/users/register').send({ ...registration, agreeToTerms: false });
      const badType = await request(app).post('/api/users/register').send({ ...registration, userType: 'patient' });

      expect(badName.status).toBe(400);
      expect(badName.body).toEqual({
        error: 'Invalid first name',
        message: 'Name can only contain letters, spaces, hyphens, and apostrophes'
      });
      expect(mismatch.body.error).toBe('Password mismatch');
      expect(noTerms.body.error).toBe('Terms not accepted');
      expect(badType.body).toEqual({
        error: 'Invalid user type',
        message: 'User type must be one of: healthcare, researcher, student, other'
      });
      expect(fakeFirebaseAuth.users.size).toBe(2);
    });

    it('GET /api/users/profile requires a bearer token', async () => {
      const { app } = await buildApp();

      const res = await request(app).get('/api/users/profile');

      expect(res.status).toBe(401);
    });

    it('returns the signed-in profile', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .get('/api/users/profile')
        .set('Authorization', 'Bearer user-token');

      expect(res.status).toBe(200);
      expect(res.body.user).toEqual(expect.objectContaining({
        uid: 'user-1',
        email: 'doctor@example.com',
        firstName: 'Dr',
        lastName: 'Test',
        userType: 'healthcare',
        role: 'user'
      }));
    });

    it('updates names and user type', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .put('/api/users/profile')
        .set('Authorization', 'Bearer user-token')
        .send({ firstName: 'Doctor', userType: 'student' });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Profile updated successfully');
      expect(res.body.user).toEqual(expect.objectContaining({
        name: 'Doctor Test',
        firstName: 'Doctor',
        lastName: 'Test',
        userType: 'student'
      }));
    });

    it('rejects invalid or empty profile updates', async () => {
      const { app } = await buildApp();

      const badName = await request(app)
        .put('/api/users/profile')
        .set('Authorization', 'Bearer user-token')
        .send({ lastName: 'X' });
      const nothing = await request(app)
        .put('/api/users/profile')
        .set('Authorization', 'Bearer user-token')
        .send({ nickname: 'doc' });

      expect(badName.status).toBe(400);
      expect(badName.body).toEqual({ error: 'Invalid last name', message: 'Name must be at least 2 characters long' });
      expect(nothing.status).toBe(400);
      expect(nothing.body.error).toBe('No valid fields to update');
    });

    it('changes the password and ends other sessions', async () => {
      const { app } = await buildApp();

      const mismatch = await request(app)
        .post('/api/users/change-password')
        .set('Authorization', 'Bearer user-token')
        .send({ newPassword: 'newpass123', confirmPassword: 'newpass124' });
      const weak = await request(app)
        .post('/api/users/change-password')
        .set('Authorization', 'Bearer user-token')
        .send({ newPassword: 'short1', confirmPassword: 'short1' });
      const changed = await request(app)
        .post('/api/users/change-password')
        .set('Authorization', 'Bearer user-token')
        .send({ newPassword: 'newpass123', confirmPassword: 'newpass123' });

      expect(mismatch.status).toBe(400);
      expect(weak.body).toEqual({ error: 'Invalid new password', message: 'Password must be at least 8 characters long' });
      expect(changed.status).toBe(200);
      expect(changed.body).toEqual({ message: 'Password changed successfully' });
      expect(fakeFirebaseAuth.passwords.get('user-1')).toBe('newpass123');
      expect(fakeFirebaseAuth.revoked).toEqual(['user-1']);
    });

    it('logs out by revoking refresh tokens', async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post('/api/users/logout')
        .set('Authorization', 'Bearer admin-token');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Logged out successfully' });
      expect(fakeFirebaseAuth.revoked).toEqual(['admin-1']);
    });
  });
});
