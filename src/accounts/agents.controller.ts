import { Body, Controller, Get, Post } from '@nestjs/common';
import { AgentsService } from './agents.service';
import { CreateAgentDto } from './dto/create-agent.dto';
import { CurrentUser } from '../auth/current-user.decorator';
import { User } from './user.entity';

@Controller('agents')
export class AgentsController {
  constructor(private readonly agentsService: AgentsService) {}

  @Post()
  promote(@CurrentUser() user: User, @Body() dto: CreateAgentDto) {
    return this.agentsService.promote(user, dto);
  }

  @Get('me')
  me(@CurrentUser() user: User) {
    return this.agentsService.findForUser(user);
  }
}
