import { Controller, Get } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';

@ApiExcludeController()
@Controller()
export class AppController {
  @Get()
  root(): { message: string } {
    return { message: 'Bienvenido a la API de búsqueda de restaurantes' };
  }
}
