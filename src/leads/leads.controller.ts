import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { LeadsService } from './leads.service';
import { LeadView, toLeadView } from './lead-view';
import { CreateLeadDto } from './dto/create-lead.dto';
import { UpdateLeadDto } from './dto/update-lead.dto';
import { SubmitLeadDto } from './dto/submit-lead.dto';
import { AddNoteDto } from './dto/add-note.dto';
import { AssignLeadDto } from './dto/assign-lead.dto';
import { ListLeadsQueryDto } from './dto/list-leads-query.dto';
import { CurrentUser } from '../auth/current-user.decorator';
import { User } from '../accounts/user.entity';

@Controller('leads')
export class LeadsController {
  constructor(private readonly leadsService: LeadsService) {}

  @Get()
  list(@CurrentUser() user: User, @Query() query: ListLeadsQueryDto) {
    return this.leadsService.list(user, query);
  }

  @Post()
  async create(
    @CurrentUser() user: User,
    @Body() dto: CreateLeadDto,
  ): Promise<LeadView> {
    return toLeadView(await this.leadsService.createForAgent(user, dto));
  }

  @Get('stats')
  stats(@CurrentUser() user: User) {
    return this.leadsService.stats(user);
  }

  @Get(':id')
  async findOne(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<LeadView> {
    return toLeadView(await this.leadsService.findOne(user, id));
  }

  @Patch(':id')
  async update(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateLeadDto,
  ): Promise<LeadView> {
    return toLeadView(await this.leadsService.update(user, id, dto));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@CurrentUser() user: User, @Param('id', ParseIntPipe) id: number) {
    return this.leadsService.remove(user, id);
  }

  @Post(':id/submit')
  @HttpCode(HttpStatus.OK)
  async submit(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: SubmitLeadDto,
  ): Promise<LeadView> {
    return toLeadView(await this.leadsService.submit(user, id, dto));
  }

  @Post(':id/notes')
  addNote(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AddNoteDto,
  ) {
    return this.leadsService.addNote(user, id, dto);
  }

  @Post(':id/assign')
  @HttpCode(HttpStatus.OK)
  async assign(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AssignLeadDto,
  ): Promise<LeadView> {
    return toLeadView(await this.leadsService.assign(user, id, dto));
  }

  @Get(':id/document')
  document(@CurrentUser() user: User, @Param('id', ParseIntPipe) id: number) {
    return this.leadsService.document(user, id);
  }
}
