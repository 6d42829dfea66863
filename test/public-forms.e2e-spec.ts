import request from 'supertest';
import { FormTemplate } from '../src/forms/form-template.entity';
import { createTestApp, productId, TestApp } from './utils/test-app';

describe('Public forms (e2e)', () => {
  let ctx: TestApp;
  const year = new Date().getUTCFullYear();

  const server = () => ctx.app.getHttpServer();
  const forms = () => ctx.dataSource.getRepository(FormTemplate);

  beforeAll(async () => {
    ctx = await createTestApp();
    const termLifeId = await productId(ctx, 'term-life-plan');

    await forms().save([
      forms().create({
        title: 'Quick Life Quote',
        productId: termLifeId,
        isShareable: true,
        shareToken: 'quick-life-quote',
        schema: {
          fields: [
            { name: 'customer_name', required: true },
            { name: 'phone', required: true },
            { name: 'coverage_amount' },
          ],
        },
      }),
      forms().create({
        title: 'Last Season Offer',
        productId: termLifeId,
        isShareable: true,
        shareToken: 'last-season-offer',
        shareExpiry: new Date(Date.now() - 24 * 60 * 60 * 1000),
        schema: { fields: [] },
      }),
    ]);
  });

  afterAll(async () => {
    if (ctx) {
      await ctx.app.close();
    }
  });

  it('should serve seeded templates by share token without a bearer token', async () => {
    const seeded = await forms().findOneByOrFail({
      title: 'Life Insurance Application',
    });

    const response = await request(server())
      .get(`/public/forms/${seeded.shareToken}`)
      .expect(200);

    expect(response.body.title).toBe('Life Insurance Application');
    expect(response.body.shareUrl).toBe(`/public/forms/${seeded.shareToken}`);
    expect(seeded.shareToken).toMatch(/^[A-Za-z0-9]{32}$/);
  });

  it('should answer 404 for unknown tokens', async () => {
    const response = await request(server())
      .get('/public/forms/no-such-form')
      .expect(404);

    expect(response.body.message).toBe('Form not found or not accessible');
  });

  it('should answer 410 for expired links', async () => {
    await request(server()).get('/public/forms/last-season-offer').expect(410);
  });

  it('should enforce the required fields of the template', async () => {
    const response = await request(server())
      .post('/public/forms/quick-life-quote/submit')
      .send({ formData: { customer_name: 'Farah Ali' } })
      .expect(400);

    expect(response.body.message).toBe('Missing required fields: phone');
  });

  it('should reject form contact details that exceed the stored length', async () => {
    const response = await request(server())
      .post('/public/forms/quick-life-quote/submit')
      .send({
        formData: {
          customer_name: 'Farah Ali',
          phone: '9'.repeat(21),
        },
      })
      .expect(400);

    expect(response.body.message).toEqual([
      'customerPhone must be shorter than or equal to 20 characters',
    ]);
  });

  it('should create an unowned lead from a public submission', async () => {
    const response = await request(server())
      .post('/public/forms/quick-life-quote/submit')
      .send({
        formData: {
          customer_name: 'Farah Ali',
          phone: '9111111111',
          coverage_amount: 2500000,
        },
      })
      .expect(201);

    expect(response.body.referenceNumber).toBe(`LI-${year}-1`);
    expect(response.body.agentId).toBeNull();
    expect(response.body.source).toBe('public_share');
    expect(response.body.status).toBe('submitted');
    expect(response.body.customerName).toBe('Farah Ali');
    expect(response.body.customerPhone).toBe('9111111111');
    const created = response.body.activities.find(
      (activity: { activityType: string }) => activity.activityType === 'created',
    );
    expect(created.description).toBe(
      'Lead submitted via public form "Quick Life Quote"',
    );
    expect(created.userId).toBeNull();
  });
});
