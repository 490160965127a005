import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import request from 'supertest';
import { AppModule } from '../../src/app.module';
import { SeedService } from '../../src/restaurantes/infrastructure/persistence/seed.service';
import { RestaurantListing } from '../../src/restaurantes/domain/entities/restaurant-listing.entity';
import { ListingCacheService } from '../../src/restaurantes/infrastructure/cache/listing-cache.service';
import { FindRestaurantsResponseSchema } from '../../src/restaurantes/application/dto/find-restaurants.dto';

describe('Restaurantes API (e2e)', () => {
  let app: INestApplication;
  let cache: ListingCacheService;
  let seeded: number;

  const titles = (body: { resultados: { titulo: string }[] }) =>
    body.resultados.map((item) => item.titulo);

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();
    cache = moduleFixture.get<ListingCacheService>(ListingCacheService);

    // Set global prefix to match production
    app.setGlobalPrefix('api', {
      exclude: ['/'],
    });

    await app.init();
    seeded = await moduleFixture.get<SeedService>(SeedService).seed();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    cache.clear();
  });

  describe('seeding', () => {
    it('should load the bundled listings once', async () => {
      const repository = app.get<Repository<RestaurantListing>>(
        getRepositoryToken(RestaurantListing),
      );

      expect(seeded).toBe(16);
      await expect(app.get(SeedService).seed()).resolves.toBe(0);
      expect(await repository.count()).toBe(16);
    });
  });

  describe('GET /', () => {
    it('should greet', async () => {
      const response = await request(app.getHttpServer()).get('/').expect(200);

      expect(response.body).toEqual({
        message: 'Bienvenido a la API de búsqueda de restaurantes',
      });
    });
  });

  describe('GET /api/restaurantes/:city', () => {
    it('should list the restaurants of a city', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Madrid')
        .expect('Content-Type', /application\/json/)
        .expect(200);

      expect(response.body).toEqual({
        resultados: [
          {
            titulo: 'Casa Pepe',
            estrellas: 4.5,
            rango_de_precios: '$$',
            url_maps: 'https://maps.example/1',
          },
        ],
      });
    });

    it('should return bodies that match the declared schema', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .expect(200);

      expect(FindRestaurantsResponseSchema.safeParse(response.body).success).toBe(
        true,
      );
      for (const item of response.body.resultados) {
        expect(item.titulo.length).toBeGreaterThan(0);
        expect(typeof item.estrellas).toBe('number');
      }
    });

    it('should return 404 for a city without restaurants', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Atlantis')
        .expect(404);

      expect(response.body).toEqual({
        error: 'not_found',
        detail: 'No se encontraron restaurantes',
      });
    });

    it('should order by rating, then title', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .expect(200);

      expect(titles(response.body)).toEqual([
        'La Barra del Born',
        'Taberna del Raval',
        'Marisquería Port Vell',
        'Arrocería Barceloneta',
        'Pizzeria Sant Pau',
      ]);
    });

    it('should match cities regardless of case and accents', async () => {
      const lower = await request(app.getHttpServer())
        .get('/api/restaurantes/malaga')
        .expect(200);
      const upper = await request(app.getHttpServer())
        .get(`/api/restaurantes/${encodeURIComponent('MÁLAGA')}`)
        .expect(200);

      expect(titles(lower.body)).toEqual([
        'Terraza del Puerto',
        'Bodega Alcazaba',
      ]);
      expect(upper.body).toEqual(lower.body);
    });

    it('should decode multi-word city names', async () => {
      const response = await request(app.getHttpServer())
        .get(`/api/restaurantes/${encodeURIComponent('San Sebastián')}`)
        .expect(200);

      expect(titles(response.body)).toEqual([
        'Txoko Parte Vieja',
        'Pintxos Donosti',
      ]);
    });

    it('should reject a blank city', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/%20%20')
        .expect(400);

      expect(response.body.error).toBe('invalid_input');
    });

    it('should reject a city with malformed percent-encoding', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/%E0%A4%A')
        .expect(400);

      expect(response.body).toEqual({
        error: 'invalid_input',
        detail: "Failed to decode param '%E0%A4%A'",
      });
    });

    it('should cap results with limit', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ limit: 2 })
        .expect(200);

      expect(titles(response.body)).toEqual([
        'La Barra del Born',
        'Taberna del Raval',
      ]);
    });

    it('should reject an out of range limit', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ limit: 0 })
        .expect(400);

      expect(response.body.error).toBe('invalid_input');
    });

    it('should filter by price range', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ price_range: '$' })
        .expect(200);

      expect(response.body).toEqual({
        resultados: [
          {
            titulo: 'Pizzeria Sant Pau',
            estrellas: 4.2,
            rango_de_precios: '$',
            url_maps: 'https://maps.example/6',
          },
        ],
      });
    });

    it('should filter by cuisine', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ cocina: 'marisco' })
        .expect(200);

      expect(titles(response.body)).toEqual([
        'Marisquería Port Vell',
        'Arrocería Barceloneta',
      ]);
    });

    it('should filter by diet', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ diet: 'vegetariano' })
        .expect(200);

      expect(titles(response.body)).toEqual([
        'La Barra del Born',
        'Pizzeria Sant Pau',
      ]);
    });

    it('should filter by dishes mentioned in reviews', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ dish: 'paella,croquetas' })
        .expect(200);

      expect(titles(response.body)).toEqual([
        'Taberna del Raval',
        'Arrocería Barceloneta',
      ]);
    });

    it('should reject a cuisine made only of combining marks', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ cocina: '\u0301' })
        .expect(400);

      expect(response.body).toEqual({
        error: 'invalid_input',
        detail: 'cocina has no searchable terms',
      });
    });

    it('should return 404 when filters leave nothing', async () => {
      await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ price_range: '$$$$' })
        .expect(404);
    });

    it('should sort by proximity within the search radius', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Barcelona')
        .query({ coordenadas: '41.3851,2.1734' })
        .expect(200);

      expect(titles(response.body)).toEqual([
        'Taberna del Raval',
        'La Barra del Born',
        'Marisquería Port Vell',
        'Arrocería Barceloneta',
      ]);
    });

    it('should skip listings without coordinates in proximity searches', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Valencia')
        .query({ coordenadas: '39.4699,-0.3763' })
        .expect(200);

      expect(titles(response.body)).toEqual(['Arrocería del Mercado']);
    });

    it('should reject malformed coordinates', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/restaurantes/Madrid')
        .query({ coordenadas: 'norte' })
        .expect(400);

      expect(response.body.error).toBe('invalid_input');
    });
  });
});
