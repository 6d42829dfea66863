import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { IncomingMessage } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { validateEnv } from './config/env.validation';
import { CommonModule } from './common/common.module';
import { AuthModule } from './auth/auth.module';
import { AccountsModule } from './accounts/accounts.module';
import { IdentifiersModule } from './identifiers/identifiers.module';
import { ClientsModule } from './clients/clients.module';
import { ProductsModule } from './products/products.module';
import { DocumentsModule } from './documents/documents.module';
import { LeadsModule } from './leads/leads.module';
import { FormsModule } from './forms/forms.module';
import { HealthModule } from './health/health.module';
import { MetricsController } from './metrics/metrics.controller';

function databaseOptions(configService: ConfigService): TypeOrmModuleOptions {
  const synchronize =
    configService.get<boolean>('DB_SYNCHRONIZE') ??
    configService.get<string>('NODE_ENV') !== 'production';

  if (configService.get<string>('DB_TYPE') === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: configService.get<string>('DATABASE_PATH', 'data/leads.sqlite'),
      autoLoadEntities: true,
      synchronize,
    };
  }
  return {
    type: 'postgres',
    url: configService.get<string>('DATABASE_URL'),
    autoLoadEntities: true,
    synchronize,
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const env = configService.get<string>('NODE_ENV');
        return {
          pinoHttp: {
            level:
              env === 'test'
                ? 'silent'
                : configService.get<string>('LOG_LEVEL', 'info'),
            transport:
              env === 'development'
                ? { target: 'pino-pretty', options: { colorize: true } }
                : undefined,
            genReqId: (request: IncomingMessage) => {
              const header = request.headers['x-request-id'];
              return typeof header === 'string' && header ? header : uuidv4();
            },
            redact: [
              'req.headers.authorization',
              '[*].email',
              '[*].phone',
              '[*].customerEmail',
              '[*].customerPhone',
            ],
          },
        };
      },
    }),
    PrometheusModule.register({
      path: '/metrics',
      controller: MetricsController,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: databaseOptions,
    }),
    ThrottlerModule.forRoot([{ ttl: 60_000, limit: 60 }]),
    CommonModule,
    AuthModule,
    AccountsModule,
    IdentifiersModule,
    ClientsModule,
    ProductsModule,
    DocumentsModule,
    LeadsModule,
    FormsModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
